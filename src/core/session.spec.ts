import { describe, it, expect } from 'vitest'
import { HistoryBuffer } from './session.js'

describe('HistoryBuffer', () => {
  it('should keep items oldest first', () => {
    const buf = new HistoryBuffer<number>(3)
    buf.push(1)
    buf.push(2)

    expect(buf.toArray()).toEqual([1, 2])
    expect(buf.latest()).toBe(2)
    expect(buf.size).toBe(2)
  })

  it('should evict the oldest item once full', () => {
    const buf = new HistoryBuffer<number>(3)
    for (let i = 1; i <= 5; i++) buf.push(i)

    expect(buf.toArray()).toEqual([3, 4, 5])
    expect(buf.size).toBe(3)
  })

  it('should stay at capacity across many evictions', () => {
    const buf = new HistoryBuffer<number>(3)
    for (let i = 1; i <= 100; i++) buf.push(i)

    expect(buf.size).toBe(3)
    expect(buf.toArray()).toEqual([98, 99, 100])
    expect(buf.latest()).toBe(100)
  })

  it('should hand out copies', () => {
    const buf = new HistoryBuffer<string>(2)
    buf.push('a')
    buf.toArray().push('b')

    expect(buf.toArray()).toEqual(['a'])
  })

  it('should empty on clear', () => {
    const buf = new HistoryBuffer<number>(2)
    buf.push(1)
    buf.clear()

    expect(buf.size).toBe(0)
    expect(buf.latest()).toBeUndefined()
  })

  it('should reject a non-positive capacity', () => {
    expect(() => new HistoryBuffer(0)).toThrow(RangeError)
    expect(() => new HistoryBuffer(1.5)).toThrow(RangeError)
  })
})
