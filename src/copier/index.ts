export { BINARY_SNIFF_LENGTH, isBinaryContent, type RewrittenContent, rewriteContent } from './content.js';
export { type CopyJob, CopyExecutor, executeCopy } from './executor.js';
export { type RenameOptions, type RenameResult, rewriteName } from './paths.js';
export { type CopiedEntry, type CopyReport, formatIssue, type ScanReport } from './report.js';
export { InPlaceScanner, type ScanJob, scanInPlace } from './scanner.js';
