import fs from 'fs-extra'
import path from 'path'
import type { ArtifactDirectories, ArtifactKey, Logger } from '@dockrun/types'
import { artifactFileName } from '@dockrun/dock-utils'

/**
 * Maps artifact keys to files and publishes new artifacts through a hidden
 * staging file, so a final location only ever holds a complete artifact.
 */
export class ArtifactStore {
  constructor(
    private readonly dirs: ArtifactDirectories,
    private readonly logger: Logger
  ) {}

  locationFor(key: ArtifactKey): string {
    return path.join(this.dirs[key.kind], artifactFileName(key))
  }

  stagingPathFor(key: ArtifactKey): string {
    const location = this.locationFor(key)
    const ext = path.extname(location)
    const name = path.basename(location, ext)
    return path.join(path.dirname(location), `.${name}.partial${ext}`)
  }

  async exists(key: ArtifactKey): Promise<boolean> {
    return fs.pathExists(this.locationFor(key))
  }

  async shouldBuild(key: ArtifactKey, forceRebuild: boolean): Promise<boolean> {
    if (forceRebuild) return true
    const location = this.locationFor(key)
    if (await fs.pathExists(location)) {
      this.logger.info(`[SKIP] ${key.kind} exists -> ${location}`)
      return false
    }
    return true
  }

  /**
   * Runs `producer` against staging paths for `keys` and moves each staging
   * file that was written over its final location. Staging files are
   * removed when the producer throws. Returns the published locations.
   */
  async build(
    keys: readonly ArtifactKey[],
    producer: (stagingPaths: string[]) => Promise<void>
  ): Promise<string[]> {
    const staging = keys.map((key) => this.stagingPathFor(key))
    for (const file of staging) {
      await fs.ensureDir(path.dirname(file))
      await fs.remove(file)
    }

    try {
      await producer(staging)
    } catch (error) {
      await Promise.all(staging.map((file) => fs.remove(file)))
      throw error
    }

    const published: string[] = []
    for (const [index, key] of keys.entries()) {
      const location = this.locationFor(key)
      if (await fs.pathExists(staging[index])) {
        await fs.move(staging[index], location, { overwrite: true })
        published.push(location)
      } else {
        this.logger.warn(`[WARN] No ${key.kind} written for ${location}`)
      }
    }
    return published
  }
}
