/**
 * Shared report types used by the mapping, workbook and remap modules.
 */

export type Severity = 'error' | 'warning';

/**
 * Individual validation issue
 */
export interface ValidationIssue {
  severity: Severity;
  ruleId: string;
  message: string;
  rowIndex?: number;          // 1-based CSV line (mapping files)
  location?: string;          // element path (workbooks)
  field?: string;
}

/**
 * Validation report returned by the validation tools
 */
export interface ValidationReport<TSummary> {
  valid: boolean;             // true when no issue has severity 'error'
  summary: TSummary;
  issues: ValidationIssue[];
  timestamp: string;
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some(i => i.severity === 'error');
}
