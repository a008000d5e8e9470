import { ReflectError } from "@reflectable/core";

/** Document text is not YAML or JSON, or holds values outside the tree-value model. */
export class DocumentParseError extends ReflectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_ERROR", message, details);
  }
}
