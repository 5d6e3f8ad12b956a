import { describe, it, expect } from 'vitest'
import { isWindows } from '../../../src/util/platform.js'

describe('isWindows', () => {
  it('should follow process.platform', () => {
    expect(isWindows()).toBe(process.platform === 'win32')
  })
})
