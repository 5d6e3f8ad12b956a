/**
 * Wrapped values that pass the structural ciphertext check without a real
 * age identity behind them. Decrypting them fails.
 */

function stub(body: string): string {
  // The v2 payload omits the magic line and the `-> X25519 ` lead.
  return 'v2:' + Buffer.from(`c3R1Yg\n${body}\n--- bWFj\n`).toString('base64url')
}

export const SEALED_A = stub('YWJj')
export const SEALED_B = stub('ZGVm')
