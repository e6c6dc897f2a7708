import { describe, it, expect } from 'vitest'
import { isVersionSupported, formatUnsupportedVersionError } from '../version-utils.js'

describe('isVersionSupported', () => {
  it('accepts listed versions only', () => {
    expect(isVersionSupported('1', ['1'])).toBe(true)
    expect(isVersionSupported('2', ['1'])).toBe(false)
    expect(isVersionSupported('1', [])).toBe(false)
  })
})

describe('formatUnsupportedVersionError', () => {
  it('names the version found and the supported ones', () => {
    expect(formatUnsupportedVersionError('3', ['1', '2'])).toBe(
      'Configuration format version "3" is not supported. This release supports: 1, 2.',
    )
  })
})
