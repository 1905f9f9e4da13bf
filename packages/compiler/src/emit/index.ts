// Emit - generated module text for a merged page

export {
  generatePageModule,
  referenceGenerator,
  type CodeGenerator,
  type GeneratedCode,
} from "./generator.js";

export {
  sanitizeClassName,
  sanitizeIdentifier,
  resolveModelType,
  substituteModelType,
  type NamingContext,
} from "./naming.js";

export { resolveTagHelperLog, type TagHelperResolution } from "./tag-helpers.js";

export { LineWriter, type SpanMapping } from "./writer.js";
