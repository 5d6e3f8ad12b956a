export { decryptValue, decryptWith, encryptValue, reencryptValue } from './age.js'
export {
  AGE_MAGIC_LINE,
  CIPHERTEXT_PREFIXES,
  CURRENT_ENCODING,
  ciphertextProblem,
  decodeCiphertext,
  encodeCiphertext,
  isEncrypted,
  splitWrapped,
  validateCiphertext,
} from './encoding.js'
export type { CiphertextEncoding, WrappedParts } from './encoding.js'
