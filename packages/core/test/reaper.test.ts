import assert from 'node:assert/strict'
import { setTimeout as sleep } from 'node:timers/promises'
import test from 'node:test'
import { ExpiryReaper, MemoryQuoteStore, type QuoteStore } from '../src/index.js'

test('sweep() evicts expired quotes using one clock reading', async () => {
  const store = new MemoryQuoteStore()
  await store.put('old', { amount: '1', ownerId: 'c1', expiresAt: 10, consumed: false })
  await store.put('new', { amount: '1', ownerId: 'c1', expiresAt: 30, consumed: false })

  let reads = 0
  const reaper = new ExpiryReaper({
    store,
    clock: () => {
      reads++
      return 20
    },
  })

  assert.equal(await reaper.sweep(), 1)
  assert.equal(reads, 1)
  assert.equal(await store.get('old'), undefined)
  assert.ok(await store.get('new'))
})

test('repeated sweeps converge and are safe on an empty store', async () => {
  const store = new MemoryQuoteStore()
  const reaper = new ExpiryReaper({ store, clock: () => 100 })

  assert.equal(await reaper.sweep(), 0)

  await store.put('a', { amount: '1', ownerId: 'c1', expiresAt: 50, consumed: true })
  await store.put('b', { amount: '1', ownerId: 'c1', expiresAt: 150, consumed: false })

  assert.equal(await reaper.sweep(), 1)
  assert.equal(await reaper.sweep(), 0)
  assert.equal(store.size, 1)
})

test('start() runs sweeps periodically until stop()', async () => {
  const store = new MemoryQuoteStore()
  let now = 0
  const reaper = new ExpiryReaper({ store, intervalSeconds: 0.01, clock: () => now })

  reaper.start()
  reaper.start()
  assert.equal(reaper.running, true)

  await store.put('q1', { amount: '1', ownerId: 'c1', expiresAt: 5, consumed: false })
  now = 10
  await sleep(60)
  assert.equal(store.size, 0)

  reaper.stop()
  assert.equal(reaper.running, false)

  await store.put('q2', { amount: '1', ownerId: 'c1', expiresAt: 5, consumed: false })
  await sleep(40)
  assert.equal(store.size, 1)

  reaper.stop()
})

test('a failing sweep does not stop the loop', async () => {
  let calls = 0
  const store: QuoteStore = {
    size: 0,
    put: async () => undefined,
    get: async () => undefined,
    tryConsume: async () => ({ consumed: false, reason: 'not_found' }),
    evictExpired: async () => {
      calls++
      if (calls === 1) {
        throw new Error('backend unavailable')
      }
      return 0
    },
  }
  const reaper = new ExpiryReaper({ store, intervalSeconds: 0.01, clock: () => 0 })

  reaper.start()
  await sleep(80)
  reaper.stop()

  assert.ok(calls >= 2, `expected at least two sweeps, saw ${calls}`)
})

test('the interval must be positive', () => {
  assert.throws(() => new ExpiryReaper({ store: new MemoryQuoteStore(), intervalSeconds: -1 }), RangeError)
})
