import { OutputFormat, ToolArgs } from '../types/index.js';
import { isPlainObject } from '../decoding/json-extract.js';

const ISSUE_STATES = ['open', 'closed', 'all'] as const;
const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/**
 * Narrow raw `tools/call` arguments to ToolArgs; unknown keys and ill-typed values are dropped
 */
export function parseToolArgs(raw: unknown): ToolArgs {
  if (!isPlainObject(raw)) return {};

  const state = ISSUE_STATES.find(candidate => candidate === raw.state);
  const format = OUTPUT_FORMATS.find(candidate => candidate === raw.format);
  // analysis_json may also arrive already parsed
  const analysisJson = isPlainObject(raw.analysis_json)
    ? JSON.stringify(raw.analysis_json)
    : optionalString(raw.analysis_json);

  return {
    repo: optionalString(raw.repo),
    issue_number: optionalNumber(raw.issue_number),
    state,
    labels: optionalString(raw.labels),
    assignee: optionalString(raw.assignee),
    limit: optionalNumber(raw.limit),
    post_comment: optionalBoolean(raw.post_comment),
    format,
    analysis_json: analysisJson,
  };
}
