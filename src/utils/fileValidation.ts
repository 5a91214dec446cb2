import path from 'path'
import { fromFile as fileTypeFromFile } from 'file-type'
import { getLogger } from '../lib/logger'

const log = getLogger('cli')

const SUPPORTED_EXTENSIONS = [
  '.mp4',
  '.mkv',
  '.mov',
  '.avi',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
  '.3gp',
  '.mp3',
  '.wav',
  '.m4a',
  '.flac',
  '.aac',
  '.ogg',
  '.wma',
]

const UNSUPPORTED_MESSAGE = 'Not an audio or video file'

export function isSupportedExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase())
}

/**
 * Check that a file looks like media. Magic bytes first; when detection fails or disagrees,
 * a known media extension is enough (some containers have no reliable signature).
 * Returns an error message, or null when the file is acceptable.
 */
export async function validateInputFile(filePath: string): Promise<string | null> {
  try {
    const fileType = await fileTypeFromFile(filePath)
    log.debug({ msg: 'Detected input type', file: path.basename(filePath), mime: fileType?.mime })

    if (fileType && (fileType.mime.startsWith('audio/') || fileType.mime.startsWith('video/'))) {
      return null
    }
    return isSupportedExtension(filePath) ? null : UNSUPPORTED_MESSAGE
  } catch (error) {
    log.warn({ msg: 'File type detection failed', file: path.basename(filePath), err: String(error) })
    return isSupportedExtension(filePath) ? null : UNSUPPORTED_MESSAGE
  }
}
