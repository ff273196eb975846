import { Stage } from './types';

export const STAGE_FOCUS: Record<Stage, string> = {
  Negotiation:
    'FOCUS (Negotiation): Flag every vague, ambiguous or one-sided clause the buyer should renegotiate before committing.',
  TokenPayment:
    'FOCUS (Token Payment): Enumerate EVERY historical deed that is referenced in the recitals or ownership narrative but is NOT present in the uploaded document.',
  LoanApplication:
    'FOCUS (Loan Application): Check the chain of title strictly for 30 continuous years. If any link in the last 30 years is missing, risk_score MUST be "High".',
};

const SCHEMA_TEMPLATE = `{
  "property_summary": "Short location description",
  "current_owner": "Name",
  "risk_score": "Low/Medium/High",
  "analysis_summary": "Two or three sentences on the state of the title",
  "missing_docs_list": [
    {"year": "YYYY", "doc_type": "str", "doc_no": "str or N/A", "reason": "str", "risk_explained": "str"}
  ]
}`;

export function buildPrompt(stage: Stage): string {
  return `Analyze this Property Deed.
Return strictly valid JSON. Do not use Markdown. Do not use \`\`\`json.
Structure:
${SCHEMA_TEMPLATE}
Rules: If a document is mentioned in 'Recitals' history but NOT uploaded, it is MISSING.
If the document number of a missing document is not stated, use "N/A".
${STAGE_FOCUS[stage]}`;
}
