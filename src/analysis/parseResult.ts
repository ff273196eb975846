import { z } from 'zod';
import { err, errorMessage, ok, Result } from '../errors';
import { AnalysisError, AnalysisResult, RISK_SCORES, RiskScore, UNCONFIRMED_DOC_NO } from './types';

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?/gi, '').trim();
}

// Numbers are accepted for year-like fields; null, missing and blank fall back.
const text = (fallback: string) =>
  z.preprocess((value) => {
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string' || value.trim() === '') return fallback;
    return value.trim();
  }, z.string());

const riskScore = z.unknown().transform((value): RiskScore => {
  if (typeof value !== 'string') return 'Unknown';
  const wanted = value.trim().toLowerCase();
  return RISK_SCORES.find((score) => score.toLowerCase() === wanted) ?? 'Unknown';
});

const MissingDocSchema = z.object({
  year: text('N/A'),
  doc_type: text('Unknown document'),
  doc_no: text(UNCONFIRMED_DOC_NO),
  reason: text(''),
  risk_explained: text(''),
});

const AnalysisSchema = z.object({
  property_summary: text('N/A'),
  current_owner: text('N/A'),
  risk_score: riskScore,
  analysis_summary: text(''),
  missing_docs_list: z.array(MissingDocSchema).nullish(),
  missing_docs: z.array(MissingDocSchema).nullish(),
});

export function parseAnalysisText(rawText: string): Result<AnalysisResult, AnalysisError> {
  const cleaned = stripCodeFences(rawText);

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    const message = `AI output is not valid JSON: ${errorMessage(error)}`;
    return err<AnalysisError>({ kind: 'MalformedResponse', message, rawText });
  }

  const parsed = AnalysisSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
    return err<AnalysisError>({ kind: 'MalformedResponse', message: `AI output does not match the report schema (${where})`, rawText });
  }

  const { missing_docs_list, missing_docs, ...summary } = parsed.data;
  return ok({ ...summary, missing_docs: missing_docs_list ?? missing_docs ?? [] });
}
