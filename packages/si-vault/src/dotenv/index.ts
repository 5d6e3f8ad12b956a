export { DotenvDocument, isDividerLine, sectionName } from './document.js'
export type {
  AssignmentEntry,
  DotenvEntry,
  LineEnding,
  MalformedEntry,
  RawLine,
  UpsertOptions,
} from './document.js'
export { formatDocument } from './format.js'
export type { FormatOptions, FormatResult } from './format.js'
export {
  HEADER_VERSION_LINE,
  RECIPIENT_LINE_PREFIX,
  addRecipient,
  documentRecipient,
  ensureHeader,
  hasHeader,
  isHeaderLine,
  isVersionLine,
  parseRecipientLine,
  readRecipients,
  removeRecipient,
  replaceRecipient,
  trustSubject,
} from './header.js'
export { scanDotenvEncryption } from './scan.js'
export type { EncryptionScan } from './scan.js'
export { isValidKeyName, normalizeValue, parseValue, renderValue, validateKeyName } from './value.js'
export type { ParsedValue } from './value.js'
