export {
  CoercerRegistry,
  DEFAULT_LIST_SEPARATOR,
  coerce,
  createCoercerRegistry,
  defaultCoercers,
  types,
  type Coercer,
  type Constructor,
  type TypeDescriptor,
  type ValueType,
} from './coerce.js';
export {
  CoercionError,
  DeclarationError,
  DocToolError,
  OptionError,
  ParseError,
} from './errors.js';
export { OptionHolder, type GroupSettings, type OptionSettings } from './holder.js';
export {
  OptionGroup,
  type GroupMarker,
  type Multiplicity,
  type OptionDeclaration,
  type OptionField,
  type OptionSource,
} from './model.js';
export { Options, type Occurrence, type OptionsSettings, type RepeatPolicy, type ScanResult } from './options.js';
export {
  StaticCommentProvider,
  commentBody,
  flattenDocComment,
  loadCommentFile,
  noComments,
  parseDocComment,
  type CommentProvider,
  type DocComment,
  type HolderComments,
} from './comments.js';
export { renderOptions, optionToHtml, resolveDocFormat, type DocFormat, type RenderOptions } from './render.js';
export { HTML_MARKERS, commentMarkers, splice, type SpliceMarkers, type SpliceResult, type SpliceStatus } from './splice.js';
