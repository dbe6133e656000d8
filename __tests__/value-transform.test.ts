/**
 * Tests for per-field value rendering.
 *
 * Source: src/transformers/valueTransform.ts
 */
import {
  FIELD_TRANSFORMS,
  isEntityReference,
  renderList,
  renderScalar,
  transformValue,
} from '../src/transformers/valueTransform'

describe('renderScalar()', () => {
  it('passes strings and numbers through', () => {
    expect(renderScalar('A001C003')).toBe('A001C003')
    expect(renderScalar(1001)).toBe(1001)
    expect(renderScalar(0)).toBe(0)
  })

  it('treats null, undefined and blank strings as no value', () => {
    expect(renderScalar(null)).toBeUndefined()
    expect(renderScalar(undefined)).toBeUndefined()
    expect(renderScalar('')).toBeUndefined()
    expect(renderScalar('   ')).toBeUndefined()
  })

  it('renders booleans as 1/0', () => {
    expect(renderScalar(true)).toBe(1)
    expect(renderScalar(false)).toBe(0)
  })

  it('drops non-finite numbers', () => {
    expect(renderScalar(Number.NaN)).toBeUndefined()
  })
})

describe('isEntityReference()', () => {
  it('requires a numeric id', () => {
    expect(isEntityReference({ id: 4, type: 'Shot' })).toBe(true)
    expect(isEntityReference({ id: '4' })).toBe(false)
    expect(isEntityReference([{ id: 4 }])).toBe(false)
    expect(isEntityReference(null)).toBe(false)
  })
})

// =========================================================================
// Generic rules
// =========================================================================

describe('transformValue() without a registered transform', () => {
  const plain = {}

  it('renders a reference by name', () => {
    expect(transformValue(plain, { id: 77, type: 'Version', name: 'PL_010' })).toBe('PL_010')
  })

  it('falls back to the reference id when name is missing or blank', () => {
    expect(transformValue(plain, { id: 77, type: 'Version' })).toBe(77)
    expect(transformValue(plain, { id: 77, name: null })).toBe(77)
    expect(transformValue(plain, { id: 77, name: '' })).toBe(77)
  })

  it('joins list elements with a comma and a space', () => {
    const value = [
      { id: 1, name: 'lut_a' },
      { id: 2 },
      'plain',
      12,
    ]
    expect(transformValue(plain, value)).toBe('lut_a, 2, plain, 12')
  })

  it('omits empty lists instead of writing an empty string', () => {
    expect(transformValue(plain, [])).toBeUndefined()
    expect(renderList([null, ''])).toBeUndefined()
  })

  it('skips list elements that render to nothing', () => {
    expect(renderList(['a', null, '', 'b'])).toBe('a, b')
  })

  it('passes scalars through', () => {
    expect(transformValue(plain, '01:00:00:00')).toBe('01:00:00:00')
    expect(transformValue(plain, 1009)).toBe(1009)
    expect(transformValue(plain, null)).toBeUndefined()
  })
})

// =========================================================================
// Registered transforms
// =========================================================================

describe('transform: referenceId', () => {
  const foreignKey = { transform: 'referenceId' as const }

  it('renders the id even when the reference has a name', () => {
    expect(transformValue(foreignKey, { id: 1204, type: 'Shot', name: 'SH010' })).toBe(1204)
  })

  it('yields no value for an empty link', () => {
    expect(FIELD_TRANSFORMS.referenceId(null)).toBeUndefined()
  })

  it('throws on a value that is not a reference', () => {
    expect(() => transformValue(foreignKey, 'SH010')).toThrow(TypeError)
  })
})
