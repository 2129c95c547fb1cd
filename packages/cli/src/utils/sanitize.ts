/**
 * Error output sanitization
 *
 * Replaces home directory paths in error messages with `~` before they
 * reach the terminal or a JSON report.
 */

import { homedir } from 'os'
import { getErrorMessage } from '@opendata-mqa/core'

/**
 * Error message with user-specific paths replaced by `~`
 *
 * Handles the current home directory plus the generic macOS, Linux and
 * Windows home layouts.
 */
export function sanitizeError(error: unknown): string {
  const message = getErrorMessage(error)
  const escapedHome = homedir().replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

  let sanitized = escapedHome === '' ? message : message.replace(new RegExp(escapedHome, 'g'), '~')
  sanitized = sanitized.replace(/\/Users\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/\/home\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/C:\\Users\\[^\\]+\\/gi, '~\\')

  return sanitized
}
