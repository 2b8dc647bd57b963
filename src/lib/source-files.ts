/**
 * Helpers for server source file names and content
 */

export type FileKind = 'class' | 'intermediate' | 'routine'

export const ROUTINE_TYPES = ['mac', 'int', 'obj', 'inc', 'bas'] as const
export type RoutineType = (typeof ROUTINE_TYPES)[number]

const KINDS: Record<string, FileKind> = {
  bas: 'routine',
  cls: 'class',
  inc: 'routine',
  int: 'intermediate',
  mac: 'routine',
  obj: 'intermediate',
}

/**
 * Extension after the last dot, as written (no case folding)
 */
export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot === -1 ? '' : name.slice(dot + 1)
}

/**
 * Kind of a server file, from its extension. Extensions are case-sensitive.
 */
export function fileKind(name: string): FileKind | null {
  return KINDS[extensionOf(name)] ?? null
}

export function hasExtension(name: string, extensions: readonly string[]): boolean {
  return extensions.includes(extensionOf(name))
}

/**
 * System classes and routines start with %
 */
export function isSystemName(name: string): boolean {
  return name.startsWith('%')
}

/**
 * Check a name before it is sent to the server as a new file.
 * Returns an error message, or null when the name is acceptable.
 */
export function validateFileName(name: string): null | string {
  const extension = extensionOf(name)
  const stem = name.slice(0, name.length - extension.length - 1)

  if (!extension || !stem) {
    return `File name "${name}" must have a name and an extension`
  }

  if (extension !== extension.toLowerCase()) {
    return `File name "${name}" must use a lowercase extension`
  }

  if (!fileKind(name)) {
    return `File name "${name}" has unknown extension ".${extension}"`
  }

  return null
}

/**
 * Convert every line ending to CRLF
 */
export function normalizeLineEndings(text: string): string {
  return text.replaceAll(/\r\n|\r|\n/g, '\r\n')
}

export function isRoutineType(value: string): value is RoutineType {
  return ROUTINE_TYPES.some(type => type === value)
}
