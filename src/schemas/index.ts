/**
 * Export validators
 */
export { validateOptionalNames, validateWordName, validateParserSettings } from './validators';
export type {
  ValidationResult,
  OptionalNamesInput,
  ParserSettings,
  ParserSettingsInput,
} from './validators';
