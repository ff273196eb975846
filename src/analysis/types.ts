export const STAGES = ['Negotiation', 'TokenPayment', 'LoanApplication'] as const;
export type Stage = (typeof STAGES)[number];

export const RISK_SCORES = ['Low', 'Medium', 'High', 'Unknown'] as const;
export type RiskScore = (typeof RISK_SCORES)[number];

// "N/A" means the document is referenced but its existence is unconfirmed.
export const UNCONFIRMED_DOC_NO = 'N/A';

export interface MissingDoc {
  year: string;
  doc_type: string;
  doc_no: string;
  reason: string;
  risk_explained: string;
}

export interface AnalysisResult {
  property_summary: string;
  current_owner: string;
  risk_score: RiskScore;
  analysis_summary: string;
  missing_docs: MissingDoc[];
}

export type AnalysisError =
  | { kind: 'UploadFailed'; message: string }
  | { kind: 'RateLimited'; message: string }
  | { kind: 'MalformedResponse'; message: string; rawText: string }
  | { kind: 'TimeoutExceeded'; message: string; waitedMs: number }
  | { kind: 'Other'; message: string };

export function isStage(value: unknown): value is Stage {
  return typeof value === 'string' && STAGES.some((stage) => stage === value);
}
