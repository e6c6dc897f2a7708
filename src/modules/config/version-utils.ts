/**
 * Helpers for config format versions. Versions are positive integer strings.
 */

export function isVersionSupported(version: string, supported: readonly string[]): boolean {
  return supported.includes(version)
}

export function formatUnsupportedVersionError(version: string, supported: readonly string[]): string {
  return (
    `Configuration format version "${version}" is not supported. ` +
    `This release supports: ${supported.join(', ')}.`
  )
}
