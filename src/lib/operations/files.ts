/**
 * File Operations
 *
 * Moving classes and routines between local files and the server:
 * upload, download, XML import/export and edit.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { basename, join } from 'node:path'

import type { CdevFile, FileOperation, Namespace, XmlOperation } from '../entities.js'
import type { OperationContext } from './context.js'

import { CdevError } from '../errors.js'
import { logger } from '../logger.js'
import { requireNamespace } from './context.js'

export interface UploadResult {
  compile?: FileOperation
  created: boolean
  error?: string
  name: string
  path: string
  save?: FileOperation
}

export interface DownloadResult {
  content?: string
  error?: string
  name: string
  path?: string
}

export interface ImportResult {
  compile?: FileOperation
  error?: string
  import?: XmlOperation
  path: string
}

export interface ExportResult {
  content?: string
  error?: string
  name: string
}

export interface EditResult {
  downloads: DownloadResult[]
  unchanged: string[]
  uploads: UploadResult[]
}

/**
 * Opens the given local files for editing and resolves once the user is done
 */
export type EditorLauncher = (paths: string[]) => Promise<void> | void

// Client errors become per-file results; anything else is rethrown
function errorMessage(error: unknown): string {
  if (error instanceof CdevError) return error.message
  throw error
}

// Filesystem errors on a local file (ENOENT, EISDIR, EACCES...) become per-file results
function localFileError(error: unknown, path: string): string | undefined {
  if (error instanceof CdevError || !(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return undefined
  }

  return error.code === 'ENOENT' ? `File not found: ${path}` : `Cannot read ${path}: ${error.message}`
}

async function listByName(ctx: OperationContext, namespace: Namespace): Promise<Map<string, CdevFile>> {
  const files = await ctx.client.getFiles(namespace)
  return new Map(files.map(file => [file.name, file]))
}

/**
 * Save each local file to the server, creating it or updating the file of
 * the same name, then compile it. Files are handled one at a time.
 */
export async function uploadFiles(ctx: OperationContext, paths: string[], compileSpec = ''): Promise<UploadResult[]> {
  const namespace = await requireNamespace(ctx)
  const existing = await listByName(ctx, namespace)
  const results: UploadResult[] = []

  for (const path of paths) {
    const name = basename(path)
    const current = existing.get(name)
    const result: UploadResult = { created: current === undefined, name, path }

    try {
      const content = readFileSync(path, 'utf8')
      logger.fileOp('read', path)

      result.save = current
        ? await ctx.client.putFile({ ...current, content })
        : await ctx.client.addFile(namespace, name, content)

      const saved = result.save.file ?? current
      if (result.save.success && saved) {
        result.compile = await ctx.client.compileFile(saved, compileSpec)
      }
    } catch (error) {
      result.error = localFileError(error, path) ?? errorMessage(error)
    }

    results.push(result)
  }

  return results
}

/**
 * Fetch named files and write them into a directory under their server names
 */
export async function downloadFiles(ctx: OperationContext, names: string[], dir: string): Promise<DownloadResult[]> {
  const namespace = await requireNamespace(ctx)
  const existing = await listByName(ctx, namespace)
  const results: DownloadResult[] = []

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }

  for (const name of names) {
    const listed = existing.get(name)
    if (!listed) {
      results.push({ error: `File "${name}" not found in ${namespace.name}`, name })
      continue
    }

    try {
      const file = await ctx.client.getFile(listed)
      if (file.content === undefined) {
        results.push({ error: `Server returned no content for "${name}"`, name })
        continue
      }

      const path = join(dir, file.name)
      writeFileSync(path, file.content, 'utf8')
      logger.fileOp('write', path)
      results.push({ content: file.content, name, path })
    } catch (error) {
      results.push({ error: errorMessage(error), name })
    }
  }

  return results
}

/**
 * Send local XML exports to the namespace and compile the files they resolve to
 */
export async function importXmlFiles(ctx: OperationContext, paths: string[], compileSpec = ''): Promise<ImportResult[]> {
  const namespace = await requireNamespace(ctx)
  const results: ImportResult[] = []

  for (const path of paths) {
    const result: ImportResult = { path }

    try {
      const content = readFileSync(path, 'utf8')
      logger.fileOp('read', path)

      result.import = await ctx.client.addXml(namespace, content)
      if (result.import.success && result.import.file) {
        result.compile = await ctx.client.compileFile(result.import.file, compileSpec)
      }
    } catch (error) {
      result.error = localFileError(error, path) ?? errorMessage(error)
    }

    results.push(result)
  }

  return results
}

/**
 * Fetch the XML export of each named file
 */
export async function exportXml(ctx: OperationContext, names: string[]): Promise<ExportResult[]> {
  const namespace = await requireNamespace(ctx)
  const existing = await listByName(ctx, namespace)
  const results: ExportResult[] = []

  for (const name of names) {
    const listed = existing.get(name)
    if (!listed) {
      results.push({ error: `File "${name}" not found in ${namespace.name}`, name })
      continue
    }

    try {
      const xml = await ctx.client.getXml(listed)
      results.push(xml.content === undefined
        ? { error: `Server returned no XML for "${name}"`, name }
        : { content: xml.content, name })
    } catch (error) {
      results.push({ error: errorMessage(error), name })
    }
  }

  return results
}

/**
 * Download files to a scratch directory, let the user edit them, then
 * upload and compile the ones that changed
 */
export async function editFiles(
  ctx: OperationContext,
  names: string[],
  launch: EditorLauncher,
  compileSpec = ''
): Promise<EditResult> {
  const dir = mkdtempSync(join(tmpdir(), 'cdev-edit-'))

  try {
    const downloads = await downloadFiles(ctx, names, dir)
    const ready = downloads.filter(download => download.path !== undefined)

    const paths = ready.flatMap(download => download.path === undefined ? [] : [download.path])
    if (paths.length === 0) {
      return { downloads, unchanged: [], uploads: [] }
    }

    await launch(paths)

    const changed: string[] = []
    const unchanged: string[] = []
    for (const download of ready) {
      if (download.path === undefined) continue

      const edited = readFileSync(download.path, 'utf8')
      if (edited === download.content) {
        unchanged.push(download.name)
      } else {
        changed.push(download.path)
      }
    }

    const uploads = changed.length > 0 ? await uploadFiles(ctx, changed, compileSpec) : []
    return { downloads, unchanged, uploads }
  } finally {
    rmSync(dir, { force: true, recursive: true })
  }
}
