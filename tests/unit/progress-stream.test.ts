import { Readable, Writable } from 'stream'
import { pipeline } from 'stream/promises'
import { describe, it, expect } from 'vitest'
import { CancelledError, TimeoutError } from '../../engine/errors'
import { computeSha256FromBytes } from '../../engine/utils/checksum'
import { ProgressGate, abortReason } from '../../engine/utils/progressStream'

function sink(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback()
    }
  })
}

const CHUNKS = ['abcd', 'efgh', 'ijkl', 'mnop'].map((s) => Buffer.from(s))

describe('ProgressGate', () => {
  it('should report by byte delta and always on the final byte', async () => {
    const reports: number[] = []
    const gate = new ProgressGate({
      onProgress: (bytes) => reports.push(bytes),
      minIntervalMs: 1000,
      minBytes: 10,
      now: () => 0
    })

    await pipeline(Readable.from(CHUNKS), gate, sink())

    expect(reports).toEqual([12, 16])
    expect(gate.bytesTransferred).toBe(16)
  })

  it('should hash what passed through', async () => {
    const gate = new ProgressGate()
    await pipeline(Readable.from(CHUNKS), gate, sink())

    expect(gate.digest()).toBe(computeSha256FromBytes('abcdefghijklmnop'))
  })

  it('should hold chunks back to the bandwidth limit', async () => {
    // 10 KB/s: 2048 bytes are due no earlier than 200 ms after the start
    const gate = new ProgressGate({ bandwidthLimit: 10, now: () => 0 })
    const started = Date.now()

    await pipeline(Readable.from([Buffer.alloc(2048)]), gate, sink())

    expect(Date.now() - started).toBeGreaterThanOrEqual(190)
    expect(gate.bytesTransferred).toBe(2048)
  })

  it('should not wait when the transfer is already behind the limit', async () => {
    let clock = 0
    const gate = new ProgressGate({ bandwidthLimit: 10, now: () => clock })
    clock = 1000
    const started = Date.now()

    await pipeline(Readable.from([Buffer.alloc(2048)]), gate, sink())

    expect(Date.now() - started).toBeLessThan(150)
  })

  it('should fail with the abort reason', async () => {
    const controller = new AbortController()
    controller.abort(new TimeoutError('stalled'))
    const gate = new ProgressGate({ signal: controller.signal })

    await expect(pipeline(Readable.from(CHUNKS), gate, sink())).rejects.toThrow('stalled')
  })
})

describe('abortReason', () => {
  it('should fall back to a cancellation', () => {
    const controller = new AbortController()
    controller.abort('not an error')
    expect(abortReason(controller.signal)).toBeInstanceOf(CancelledError)
    expect(abortReason(undefined)).toBeInstanceOf(CancelledError)
  })
})
