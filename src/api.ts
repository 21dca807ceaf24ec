export * from './errors.js';
export { config, defaultConfig, mergeConfig } from './config.js';
export type { Config, GitConfig, ScannerConfig } from './config.js';

export {
  parseExpression,
  renderExpression,
  expressionsEqual,
  expressionSymbols,
  validateExpression,
  containsExpression,
  MAX_NESTING_DEPTH,
} from './spdx/expression.js';
export type { LicenseExpression, ExpressionSymbol, ClassifiedSymbol } from './spdx/expression.js';
export { classifyIdentifier, isLocalIdentifier } from './spdx/identifiers.js';
export type { IdentifierClass, IdentifierRole } from './spdx/identifiers.js';

export { CommentStyleRegistry, commentStyleRegistry, supportsSingleLine, supportsMultiLine } from './comments/registry.js';
export { commentText, uncommentText } from './comments/comment.js';
export type { CommentStyle, CommentForm } from './comments/types.js';

export { renderTemplate, DEFAULT_TEMPLATE } from './header/template.js';
export { synthesizeHeader, findHeader, mergeCopyrightLines } from './header/synthesizer.js';
export type { HeaderRequest, HeaderMode } from './header/synthesizer.js';
export { annotateFile, annotateFiles } from './header/annotate.js';
export type { AnnotateOptions, AnnotateResult } from './header/annotate.js';

export { extractTags } from './extractor/tags.js';
export { extractFileMetadata } from './extractor/metadata.js';
export type { FileMetadata } from './extractor/types.js';

export { Indexer, indexer } from './indexer/index.js';
export type { IndexOptions } from './indexer/index.js';
export { loadCoverageDeclaration, applyCoverage } from './indexer/coverage.js';
export type { ProjectIndex, DeclaredLicense, CoverageConflict } from './indexer/types.js';

export * from './report/index.js';
export { lint, lintProject } from './lint.js';
