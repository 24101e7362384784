import type { ComparisonRequest, ComparisonResult } from '../core/entities/Comparison.js';

export type OutputFormat = 'text' | 'json';

/**
 * JSON shape printed with --json
 */
export interface ComparisonReport {
  input_file?: string;
  output_a_file?: string;
  output_b_file?: string;
  input_message: string;
  output_a: string;
  output_b: string;
  comparison_result: string;
}

export function toReport(request: ComparisonRequest, result: ComparisonResult): ComparisonReport {
  return {
    input_file: result.inputFile,
    output_a_file: result.outputAFile,
    output_b_file: result.outputBFile,
    input_message: request.inputMessage,
    output_a: request.outputA,
    output_b: request.outputB,
    comparison_result: result.verdictText,
  };
}

/**
 * Render a finished comparison for standard output
 */
export function formatResult(
  request: ComparisonRequest,
  result: ComparisonResult,
  format: OutputFormat
): string {
  if (format === 'json') {
    return JSON.stringify(toReport(request, result), null, 2);
  }
  return ['Comparison Result:', '-'.repeat(50), result.verdictText].join('\n');
}
