export { WavCodec } from './codec'
export { decodeWav, decodeWavInto, isWav, parseWavHeader, parseWavInfo } from './decoder'
export { encodeWav, encodeWavMono, encodeWavStereo } from './encoder'
export * from './types'
