/**
 * Operations Module
 *
 * The logic behind each CLI command, usable without the CLI.
 * Commands are thin adapters that:
 * 1. Parse flags and arguments
 * 2. Call shared operations
 * 3. Format output
 */

// Context management
export {
  createContext,
  OperationError,
  requireNamespace,
} from './context.js'
export type {
  CreateContextOptions,
  OperationContext,
} from './context.js'

// File operations
export {
  downloadFiles,
  editFiles,
  exportXml,
  importXmlFiles,
  uploadFiles,
} from './files.js'
export type {
  DownloadResult,
  EditorLauncher,
  EditResult,
  ExportResult,
  ImportResult,
  UploadResult,
} from './files.js'

// Listing operations
export {
  listClasses,
  listNamespaces,
  listRoutines,
} from './list.js'
export type {
  ListOptions,
  ListRoutinesOptions,
} from './list.js'

// Query operations
export {
  explainQuery,
  runQuery,
} from './query.js'
export type {
  QueryPlanResult,
  QueryRunResult,
} from './query.js'
