/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'span' | 'parse' | 'query';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: BOZON-{category}{3-digit} (e.g., BOZON-P001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Span Errors (BOZON-S0xx)
  {
    errorId: 'BOZON-S001',
    category: 'span',
    description: 'Invalid span bounds',
    messageTemplate: 'Invalid span [{start}, {end})',
    cause:
      'Span offsets must be non-negative integers with start not after end.',
  },
  {
    errorId: 'BOZON-S002',
    category: 'span',
    description: 'Span length out of range',
    messageTemplate: 'Span length {length} exceeds limit of {limit} bytes',
    cause:
      'A single token, string literal or bracketed region is longer than a span can encode.',
    resolution:
      'Split the oversized literal or list into smaller pieces. Spans store their length in 16 bits.',
  },

  // Parse Errors (BOZON-P0xx)
  {
    errorId: 'BOZON-P001',
    category: 'parse',
    description: 'Unexpected input',
    messageTemplate: 'Unexpected {found}, expected one of: {expected}',
    cause: 'No grammar alternative matches at this position.',
    resolution:
      'Check for unbalanced or mismatched brackets, or a quote marker with nothing after it.',
  },
  {
    errorId: 'BOZON-P002',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'List nesting exceeds maximum depth of {maxDepth}',
    cause: 'Lists are nested deeper than the configured parser limit.',
    resolution: 'Flatten the expression, or raise maxDepth in the parser options.',
  },

  // Query Errors (BOZON-Q0xx)
  {
    errorId: 'BOZON-Q001',
    category: 'query',
    description: 'Missing query input',
    messageTemplate: 'No value set for input {query}({key})',
    cause: 'An input query was read before a value was set for the key.',
  },
  {
    errorId: 'BOZON-Q002',
    category: 'query',
    description: 'Query cycle',
    messageTemplate: 'Cycle detected while computing {query}({key})',
    cause: 'A query depends on itself through its own dependency chain.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "ident", actual: "')'"})
 * // Returns: "Expected ident, got ')'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += Array.isArray(value) ? value.join(', ') : String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
