/**
 * Tests for MessageChannel, Mutex and the async helpers.
 */

import { describe, it, expect } from 'vitest'
import { MessageChannel } from '../channel.js'
import { Mutex } from '../mutex.js'
import { generateId, sleep } from '../helpers.js'

describe('MessageChannel', () => {
  it('delivers buffered messages in send order', async () => {
    const channel = new MessageChannel<number>()
    channel.send(1)
    channel.send(2)
    expect(channel.size).toBe(2)

    expect(await channel.receive()).toBe(1)
    expect(await channel.receive()).toBe(2)
    expect(channel.size).toBe(0)
  })

  it('wakes a pending receiver', async () => {
    const channel = new MessageChannel<string>()
    const pending = channel.receive()
    channel.send('done')
    expect(await pending).toBe('done')
  })

  it('rejects a second concurrent receiver', () => {
    const channel = new MessageChannel<string>()
    void channel.receive()
    expect(() => channel.receive()).toThrow('MessageChannel supports a single consumer')
  })
})

describe('Mutex', () => {
  it('serializes critical sections in FIFO order', async () => {
    const mutex = new Mutex()
    const order: string[] = []

    const first = mutex.runExclusive(async () => {
      order.push('first:start')
      await sleep(5)
      order.push('first:end')
    })
    const second = mutex.runExclusive(() => {
      order.push('second')
    })

    await Promise.all([first, second])
    expect(order).toEqual(['first:start', 'first:end', 'second'])
    expect(mutex.isLocked).toBe(false)
  })

  it('ignores a repeated release', async () => {
    const mutex = new Mutex()
    const release = await mutex.acquire()
    release()
    release()
    expect(mutex.isLocked).toBe(false)
  })

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex()
    await expect(mutex.runExclusive(() => Promise.reject(new Error('fail')))).rejects.toThrow('fail')
    expect(mutex.isLocked).toBe(false)
  })
})

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort(new Error('stopped'))
    await expect(pending).rejects.toThrow('stopped')
  })

  it('rejects at once when already aborted', async () => {
    await expect(sleep(10, AbortSignal.abort(new Error('early')))).rejects.toThrow('early')
  })
})

describe('generateId', () => {
  it('prefixes ids when asked', () => {
    expect(generateId('ckpt')).toMatch(/^ckpt-[0-9a-f-]{36}$/)
    expect(generateId()).toMatch(/^[0-9a-f-]{36}$/)
  })
})
