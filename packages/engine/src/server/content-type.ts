import { fileTypeFromBuffer } from 'file-type'
import { getMimeType } from './mime-types.js'

/**
 * Maps a file's bytes and path to a Content-Type value. Pluggable so
 * embedders can swap in their own sniffing.
 */
export type ContentTypeClassifier = (
  data: Uint8Array,
  filePath: string,
) => Promise<string>

/** Extension lookup only. */
export const extensionClassifier: ContentTypeClassifier = async (_data, filePath) =>
  getMimeType(filePath)

/** Magic-byte sniffing, falling back to the extension table. */
export const sniffingClassifier: ContentTypeClassifier = async (data, filePath) => {
  const detected = await fileTypeFromBuffer(data)
  return detected?.mime ?? getMimeType(filePath)
}
