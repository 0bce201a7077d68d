export { BuildError, type BuildErrorCode } from "./build-error"
export { GetError, type GetErrorCode, type SchemaIssue } from "./get-error"
export { ParseError, type ParseErrorCode } from "./parse-error"
export { ReloadError, type ReloadErrorCode } from "./reload-error"
export { SaveError, type SaveErrorCode } from "./save-error"
export { SourceError, type SourceErrorCode } from "./source-error"
