// Compliance checking types
export enum ComplianceStatus {
  COMPLIANT = 'compliant',
  NON_COMPLIANT = 'non_compliant'
}

export enum SymbolStyle {
  UNICODE = 'unicode',
  ASCII = 'ascii'
}

export interface ParsedTitle {
  type: string; // As written, not lower-cased
  summary: string;
  project: string;
  ticket: string;
}

export interface CompliantOutcome {
  readonly status: ComplianceStatus.COMPLIANT;
  readonly isValid: true;
  readonly errors: readonly string[]; // Always empty
  readonly suggestions: readonly string[]; // Always empty
  readonly parsedFields: Readonly<ParsedTitle>;
}

export interface NonCompliantOutcome {
  readonly status: ComplianceStatus.NON_COMPLIANT;
  readonly isValid: false;
  readonly errors: readonly string[];
  readonly suggestions: readonly string[];
  readonly parsedFields?: Readonly<ParsedTitle>; // Only when the grammar matched
}

export type ComplianceOutcome = CompliantOutcome | NonCompliantOutcome;

export interface ExtractedLinks {
  readonly ticketLink?: string;
  readonly documentationLink?: string;
  readonly testingLink?: string;
}

export interface MergeRequestCheck {
  compliance: ComplianceOutcome;
  links?: ExtractedLinks; // Absent when no description was supplied
}
