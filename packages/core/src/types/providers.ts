import type { MetadataDocument } from '@querykit/validation'

export interface MetadataProvider {
  load(): Promise<MetadataDocument>
}
