import { describe, test, expect } from 'vitest'
import {
  InvalidIdentifierError,
  artifactFileName,
  isValidIdentifier,
  pairStem,
  splitPairStem,
  stemOf
} from './artifactNames.js'

describe('artifactFileName', () => {
  test('names pose and log files after the pair', () => {
    expect(
      artifactFileName({ kind: 'pose', receptor: '5CRB', ligand: 'ATENOLOL' })
    ).toBe('5CRB__ATENOLOL_out.pdbqt')
    expect(
      artifactFileName({
        kind: 'docking-log',
        receptor: '5CRB',
        ligand: 'ATENOLOL'
      })
    ).toBe('5CRB__ATENOLOL.log')
  })

  test('names single-identifier artifacts by extension', () => {
    expect(artifactFileName({ kind: 'structure', receptor: '4G6J' })).toBe(
      '4G6J.pdb'
    )
    expect(artifactFileName({ kind: 'receptor', receptor: '4G6J' })).toBe(
      '4G6J.pdbqt'
    )
    expect(artifactFileName({ kind: 'ligand-source', ligand: 'MEROPENEM' })).toBe(
      'MEROPENEM.sdf'
    )
    expect(artifactFileName({ kind: 'ligand-pdb', ligand: 'MEROPENEM' })).toBe(
      'MEROPENEM.pdb'
    )
    expect(artifactFileName({ kind: 'ligand', ligand: 'MEROPENEM' })).toBe(
      'MEROPENEM.pdbqt'
    )
  })
})

describe('pair stems', () => {
  test('round trip through the delimiter', () => {
    expect(pairStem('1IVS', 'GLUCOSAMINE')).toBe('1IVS__GLUCOSAMINE')
    expect(splitPairStem('1IVS__GLUCOSAMINE')).toEqual({
      receptor: '1IVS',
      ligand: 'GLUCOSAMINE'
    })
  })

  test('identifiers containing the delimiter are rejected', () => {
    expect(() => pairStem('my__receptor', 'L1')).toThrow(InvalidIdentifierError)
    expect(() => pairStem('R1', '')).toThrow('must not be empty')
    expect(isValidIdentifier('a/b')).toBe(false)
    expect(isValidIdentifier('4NTJ')).toBe(true)
  })

  test('identifiers with an edge underscore are rejected', () => {
    expect(() => pairStem('A_', 'B')).toThrow('must not start or end with "_"')
    expect(() =>
      artifactFileName({ kind: 'docking-log', receptor: 'A', ligand: '_B' })
    ).toThrow(InvalidIdentifierError)
    expect(isValidIdentifier('ACETYLSALICYLIC_ACID')).toBe(true)
  })

  test('every valid pair splits back into its identifiers', () => {
    for (const [receptor, ligand] of [
      ['5CRB', 'ATENOLOL'],
      ['R_1', 'L_2'],
      ['a.b', 'c-d']
    ]) {
      expect(splitPairStem(pairStem(receptor, ligand))).toEqual({ receptor, ligand })
    }
  })

  test('stems that do not split into two parts give null', () => {
    expect(splitPairStem('lonely')).toBeNull()
    expect(splitPairStem('a__b__c')).toBeNull()
    expect(splitPairStem('__b')).toBeNull()
  })
})

test('stemOf drops directory and final extension', () => {
  expect(stemOf('/data/ligands/ATENOLOL.sdf')).toBe('ATENOLOL')
  expect(stemOf('5CRB__ATENOLOL.log')).toBe('5CRB__ATENOLOL')
  expect(stemOf('.hidden')).toBe('.hidden')
  expect(stemOf('README')).toBe('README')
})
