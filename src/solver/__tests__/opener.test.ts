import { describe, it, expect } from 'vitest'
import { OpenerCache, sharedOpenerCache } from '@/solver/opener'

describe('OpenerCache', () => {
  it('scores the dictionary once and returns the first best word', () => {
    const cache = new OpenerCache()
    const dictionary = ['ee', 'ac', 'ab', 'db']
    expect(cache.has(dictionary)).toBe(false)
    expect(cache.resolve(dictionary)).toBe('ab')
    expect(cache.resolveIndex(dictionary)).toBe(2)
    expect(cache.resolve(dictionary)).toBe('ab')
    expect(cache.computations()).toBe(1)
    expect(cache.has(dictionary)).toBe(true)
  })

  it('keeps a separate entry per dictionary', () => {
    const cache = new OpenerCache()
    const a = ['ee', 'ac', 'ab', 'db']
    const b = ['db', 'ac', 'ee']
    cache.resolve(a)
    cache.resolve(b)
    cache.resolve(a)
    expect(cache.computations()).toBe(2)
  })

  it('shares an entry between equal word lists', () => {
    const cache = new OpenerCache()
    cache.resolve(['ee', 'ac', 'ab', 'db'])
    expect(cache.has(['ee', 'ac', 'ab', 'db'])).toBe(true)
    expect(cache.resolve(['ee', 'ac', 'ab', 'db'])).toBe('ab')
    expect(cache.computations()).toBe(1)
  })

  it('exposes a process-wide instance', () => {
    expect(sharedOpenerCache).toBeInstanceOf(OpenerCache)
  })
})
