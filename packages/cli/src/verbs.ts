/**
 * Verb families of the full `si` tool that this build does not carry.
 *
 * @internal
 */
export const PROVIDER_VERBS: readonly string[] = [
  'apple',
  'aws',
  'browser',
  'cloudflare',
  'codex',
  'gcp',
  'github',
  'google',
  'helia',
  'image',
  'mintlify',
  'oci',
  'openai',
  'orbits',
  'paas',
  'plugins',
  'providers',
  'publish',
  'releasemind',
  'remote',
  'self',
  'social',
  'stripe',
  'sun',
  'surf',
  'viva',
  'workos',
]
