export { encode, encodeElement, decode, decodeElement, type DecodeResult } from './stanzaCodec'
