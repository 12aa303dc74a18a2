declare module 'hypercore-crypto' {
  const crypto: {
    randomBytes(n: number): Buffer
    hash(data: Buffer | Buffer[], out?: Buffer): Buffer
  }
  export default crypto
}

declare module 'b4a' {
  const b4a: {
    from(data: string | Buffer | Uint8Array, encoding?: BufferEncoding): Buffer
    alloc(size: number): Buffer
    concat(buffers: Array<Buffer | Uint8Array>, totalLength?: number): Buffer
    byteLength(data: string | Buffer, encoding?: BufferEncoding): number
    indexOf(buffer: Buffer, value: string | number | Buffer, byteOffset?: number): number
    equals(a: Buffer | Uint8Array, b: Buffer | Uint8Array): boolean
    isBuffer(obj: unknown): obj is Buffer
    toString(buf: Buffer | Uint8Array, encoding?: BufferEncoding, start?: number, end?: number): string
  }
  export default b4a
}
