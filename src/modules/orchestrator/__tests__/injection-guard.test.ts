import { describe, it, expect } from 'vitest'
import { InjectionGuard } from '../injection-guard.js'

describe('InjectionGuard', () => {
  it('admits up to the limit per origin index', () => {
    const guard = new InjectionGuard()
    const config = { maxInjections: 2 }

    expect(guard.admit(0, config)).toBe(true)
    expect(guard.admit(0, config)).toBe(true)
    expect(guard.admit(0, config)).toBe(false)
    expect(guard.count(0)).toBe(2)
  })

  it('counts origin indexes independently', () => {
    const guard = new InjectionGuard()
    const config = { maxInjections: 1 }

    expect(guard.admit(0, config)).toBe(true)
    expect(guard.admit(1, config)).toBe(true)
    expect(guard.admit(0, config)).toBe(false)
    expect(guard.snapshot()).toEqual({ 0: 1, 1: 1 })
  })

  it('leaves the count unchanged on rejection', () => {
    const guard = new InjectionGuard({ 3: 1 })

    expect(guard.admit(3, { maxInjections: 1 })).toBe(false)
    expect(guard.count(3)).toBe(1)
  })

  it('rejects everything when the limit is zero', () => {
    const guard = new InjectionGuard()

    expect(guard.admit(0, { maxInjections: 0 })).toBe(false)
    expect(guard.snapshot()).toEqual({})
  })

  it('starts from persisted counts', () => {
    const guard = new InjectionGuard({ 2: 2 })

    expect(guard.count(2)).toBe(2)
    expect(guard.count(5)).toBe(0)
    expect(guard.admit(2, { maxInjections: 3 })).toBe(true)
    expect(guard.admit(2, { maxInjections: 3 })).toBe(false)
  })
})
