// Commit / merge request title validation
import { ComplianceStatus } from '../types/compliance';
import type {
  ComplianceOutcome,
  CompliantOutcome,
  NonCompliantOutcome,
  ParsedTitle
} from '../types/compliance';

export const VALID_TYPES = [
  'feat', 'fix', 'docs', 'style', 'refactor',
  'perf', 'test', 'chore', 'build', 'ci', 'revert'
] as const;

export const SUMMARY_MIN_LENGTH = 10;
export const SUMMARY_MAX_LENGTH = 100;

export const TITLE_FORMAT = '<type>: <short summary> (Taiga #<project>-<ticket>)';
export const TITLE_EXAMPLE = 'feat: Add login feature (Taiga #DATB-123)';

// The keyword and the type are case-insensitive; the grammar's project stays [A-Z0-9]
const TAIGA = '[Tt][Aa][Ii][Gg][Aa]';

const TITLE_RE = new RegExp(
  `^([A-Za-z]+):\\s+([^\\n]+?)\\s+\\(${TAIGA}\\s+#([A-Z0-9]+)-(\\d+)\\)$`
);
const TYPE_PREFIX_RE = /^([A-Za-z]+):/;
const NO_SPACE_AFTER_COLON_RE = /^[A-Za-z]+:\S/;
const TAIGA_REF_RE = new RegExp(`\\(${TAIGA}\\s+#[A-Za-z0-9]+-\\d+\\)`);

const VALID_TYPE_SET: ReadonlySet<string> = new Set(VALID_TYPES);

const VALID_TYPES_HINT = `Use one of the types: ${VALID_TYPES.join(', ')}`;

export function isValidType(type: string): boolean {
  return VALID_TYPE_SET.has(type.toLowerCase());
}

function nonCompliant(
  errors: string[],
  suggestions: string[],
  parsedFields?: ParsedTitle
): NonCompliantOutcome {
  const outcome: NonCompliantOutcome = {
    status: ComplianceStatus.NON_COMPLIANT,
    isValid: false,
    errors: Object.freeze([...errors]),
    suggestions: Object.freeze([...suggestions]),
    ...(parsedFields ? { parsedFields: Object.freeze({ ...parsedFields }) } : {})
  };
  return Object.freeze(outcome);
}

/**
 * Explain why a title failed the structural grammar.
 * Every probe runs; all that apply are reported.
 */
function diagnoseMismatch(title: string): { errors: string[]; suggestions: string[] } {
  const errors: string[] = [];
  const suggestions: string[] = [];

  const prefix = title.match(TYPE_PREFIX_RE);
  if (!prefix) {
    errors.push('Type prefix not found at the start of the title');
    suggestions.push("Start the title with '<type>: ' (e.g. feat:, fix:, docs:)");
  } else {
    const usedType = prefix[1].toLowerCase();
    if (!isValidType(usedType)) {
      errors.push(`Type '${usedType}' is invalid`);
      suggestions.push(VALID_TYPES_HINT);
    }
  }

  if (NO_SPACE_AFTER_COLON_RE.test(title)) {
    errors.push('Missing space after the colon (:)');
    suggestions.push("Add a space after ':' (e.g. 'feat: ' instead of 'feat:')");
  }

  if (!title.toLowerCase().includes('taiga')) {
    errors.push('Taiga reference not found');
    suggestions.push("Append '(Taiga #<project>-<ticket>)' to the end of the title");
  } else if (!TAIGA_REF_RE.test(title)) {
    errors.push('Taiga reference format is invalid');
    suggestions.push('Use the format (Taiga #<project>-<ticket>), e.g. (Taiga #DATB-123)');
  }

  if (errors.length === 0) {
    errors.push('Title format does not match the standard');
    suggestions.push(`Expected format: ${TITLE_FORMAT}`);
    suggestions.push(`Example: ${TITLE_EXAMPLE}`);
  }

  return { errors, suggestions };
}

/**
 * Validate a title against `<type>: <summary> (Taiga #<project>-<ticket>)`.
 * Never throws; a malformed title yields a NON_COMPLIANT outcome.
 */
export function validateTitle(title: string): ComplianceOutcome {
  if (!title || !title.trim()) {
    return nonCompliant(['Title must not be empty'], [`Use the format: ${TITLE_FORMAT}`]);
  }

  const trimmed = title.trim();
  const match = trimmed.match(TITLE_RE);

  if (!match) {
    const { errors, suggestions } = diagnoseMismatch(trimmed);
    return nonCompliant(errors, suggestions);
  }

  const [, type, summary, project, ticket] = match;
  const parsedFields: ParsedTitle = { type, summary, project, ticket };

  if (!isValidType(type)) {
    return nonCompliant(
      [`Type '${type.toLowerCase()}' is invalid`],
      [VALID_TYPES_HINT],
      parsedFields
    );
  }

  const errors: string[] = [];
  const suggestions: string[] = [];
  const summaryLength = Array.from(summary.trim()).length; // Code points, not UTF-16 units

  if (summaryLength < SUMMARY_MIN_LENGTH) {
    errors.push(`Summary is too short (min ${SUMMARY_MIN_LENGTH} characters)`);
    suggestions.push('Describe the change in more detail');
  }

  if (summaryLength > SUMMARY_MAX_LENGTH) {
    errors.push(`Summary is too long (max ${SUMMARY_MAX_LENGTH} characters)`);
    suggestions.push('Shorten the summary so it stays concise');
  }

  if (errors.length > 0) {
    return nonCompliant(errors, suggestions, parsedFields);
  }

  const outcome: CompliantOutcome = {
    status: ComplianceStatus.COMPLIANT,
    isValid: true,
    errors: Object.freeze([]),
    suggestions: Object.freeze([]),
    parsedFields: Object.freeze(parsedFields)
  };
  return Object.freeze(outcome);
}
