export {
  parseTemplate,
  directiveParser,
  DIRECTIVE_TAGS,
  MARKUP_DIRECTIVE,
  MODEL_DIRECTIVE,
  type ParseResult,
  type TemplateParser,
} from "./directive-parser.js";
export { isTypeExpression, isIdentifierName, isNamespaceName } from "./type-syntax.js";
