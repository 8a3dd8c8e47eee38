import { describe, expect, it } from 'vitest'
import { InvalidArgumentError } from '../../src/errors.js'
import {
  validateCount,
  validateDirection,
  validateJoinKind,
  validateOperator,
  validateTableName,
} from '../../src/validation/arguments.js'

function catchError(fn: () => unknown): InvalidArgumentError {
  try {
    fn()
  } catch (err) {
    if (err instanceof InvalidArgumentError) return err
    throw err
  }
  throw new Error('Expected InvalidArgumentError')
}

describe('validateDirection', () => {
  it('normalizes case', () => {
    expect(validateDirection('asc')).toBe('ASC')
    expect(validateDirection('Desc')).toBe('DESC')
    expect(validateDirection(' DESC ')).toBe('DESC')
  })

  it('rejects anything else', () => {
    const err = catchError(() => validateDirection('sideways'))
    expect(err.message).toBe('Order direction must be ASC or DESC')
    expect(err.details).toEqual({ argument: 'direction', actual: "'sideways'" })
  })

  it('rejects non-strings', () => {
    expect(() => validateDirection(1)).toThrow(InvalidArgumentError)
  })
})

describe('validateJoinKind', () => {
  it('normalizes case', () => {
    expect(validateJoinKind('left')).toBe('LEFT')
    expect(validateJoinKind('Full')).toBe('FULL')
    expect(validateJoinKind('INNER')).toBe('INNER')
    expect(validateJoinKind('right')).toBe('RIGHT')
  })

  it('rejects unknown kinds', () => {
    expect(() => validateJoinKind('cross')).toThrow('Join kind must be one of INNER, LEFT, RIGHT, FULL')
  })
})

describe('validateOperator', () => {
  it('accepts comparison operators verbatim', () => {
    for (const op of ['=', '!=', '<>', '<', '<=', '>', '>=']) {
      expect(validateOperator(op)).toBe(op)
    }
  })

  it('upper-cases word operators and collapses whitespace', () => {
    expect(validateOperator('like')).toBe('LIKE')
    expect(validateOperator('not   ilike')).toBe('NOT ILIKE')
  })

  it('rejects operators outside the whitelist', () => {
    const err = catchError(() => validateOperator('= 1 OR 1 ='))
    expect(err.message).toBe('Unsupported where operator: = 1 OR 1 =')
    expect(err.details.argument).toBe('operator')
  })
})

describe('validateCount', () => {
  it('accepts zero and positive integers', () => {
    expect(validateCount('limit', 0)).toBe(0)
    expect(validateCount('offset', 250)).toBe(250)
  })

  it('rejects negatives, fractions and non-numbers', () => {
    expect(catchError(() => validateCount('limit', -1)).message).toBe('limit must be a non-negative integer')
    expect(catchError(() => validateCount('offset', 1.5)).details).toEqual({ argument: 'offset', actual: '1.5' })
    expect(() => validateCount('limit', '10')).toThrow(InvalidArgumentError)
    expect(() => validateCount('limit', Number.NaN)).toThrow(InvalidArgumentError)
  })
})

describe('validateTableName', () => {
  it('trims the name', () => {
    expect(validateTableName('table', '  users ')).toBe('users')
  })

  it('rejects empty and non-string names', () => {
    expect(catchError(() => validateTableName('table', '   ')).message).toBe('table must be a non-empty string')
    expect(() => validateTableName('table', undefined)).toThrow(InvalidArgumentError)
  })
})
