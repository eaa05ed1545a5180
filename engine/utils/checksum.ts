import { createHash } from 'crypto'
import { createReadStream } from 'fs'

/** SHA-256 of a local file, hex */
export function computeSha256FromFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256')
    const stream = createReadStream(filePath)

    stream.on('data', (chunk) => {
      hash.update(chunk)
    })
    stream.on('error', reject)
    stream.on('end', () => {
      resolve(hash.digest('hex'))
    })
  })
}

export function computeSha256FromBytes(payload: Uint8Array | string): string {
  return createHash('sha256').update(payload).digest('hex')
}

/** Case-insensitive hex comparison */
export function checksumsMatch(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.trim().toLowerCase()
}
