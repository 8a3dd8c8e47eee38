import type { MetadataDocument } from '@querykit/validation'
import type { MetadataProvider } from '../types/providers.js'

/**
 * Creates a MetadataProvider that always returns the same document.
 */
export function staticMetadata(metadata: MetadataDocument): MetadataProvider {
  return {
    load: () => Promise.resolve(metadata),
  }
}
