import { AnalysisError, MissingDoc, RiskScore, Stage, UNCONFIRMED_DOC_NO } from '../analysis/types';
import { FlowStateName, LeadState, SessionContext } from './machine';

export interface Pricing {
  unlock: number;
  order: number;
}

export interface ReportItem extends MissingDoc {
  index: number;
  action: 'order' | 'inquiry';
  price: number | null;
}

interface ReportHeader {
  propertySummary: string;
  currentOwner: string;
  riskScore: RiskScore;
  missingCount: number;
}

export type ReportView =
  | { status: 'none' }
  | (ReportHeader & { status: 'clean'; analysisSummary: string; message: string })
  | (ReportHeader & { status: 'locked'; teaser: string; unlockPrice: number })
  | (ReportHeader & { status: 'unlocked'; analysisSummary: string; missingDocs: ReportItem[] });

export interface SessionView {
  id: string;
  state: FlowStateName;
  stage: Stage | null;
  document: { name: string; size: number } | null;
  isPaid: boolean;
  lead: LeadState | null;
  error: AnalysisError | null;
  report: ReportView;
}

export function teaserText(count: number): string {
  const noun = count === 1 ? 'document' : 'documents';
  return `We found ${count} missing ${noun} in the chain of title. Unlock the full report to see which ones and why.`;
}

/**
 * What the user may see of the current analysis. While locked only the
 * header and the gap count leave the server; per-document detail and the
 * written summary do not.
 */
export function renderReport(ctx: SessionContext, pricing: Pricing): ReportView {
  const { state } = ctx;
  if (state.name !== 'Locked' && state.name !== 'Unlocked') return { status: 'none' };

  const { result } = state;
  const header: ReportHeader = {
    propertySummary: result.property_summary,
    currentOwner: result.current_owner,
    riskScore: result.risk_score,
    missingCount: result.missing_docs.length,
  };

  if (state.name === 'Locked') {
    return { ...header, status: 'locked', teaser: teaserText(header.missingCount), unlockPrice: pricing.unlock };
  }

  if (header.missingCount === 0) {
    return { ...header, status: 'clean', analysisSummary: result.analysis_summary, message: 'Chain appears clean.' };
  }

  const missingDocs = result.missing_docs.map((doc, index): ReportItem => {
    const unconfirmed = doc.doc_no === UNCONFIRMED_DOC_NO;
    return {
      ...doc,
      index,
      action: unconfirmed ? 'inquiry' : 'order',
      price: unconfirmed ? null : pricing.order,
    };
  });
  return { ...header, status: 'unlocked', analysisSummary: result.analysis_summary, missingDocs };
}

export function describeSession(ctx: SessionContext, pricing: Pricing): SessionView {
  const { state } = ctx;
  return {
    id: ctx.id,
    state: state.name,
    stage: 'stage' in state ? state.stage : null,
    document: 'document' in state ? { name: state.document.originalName, size: state.document.size } : null,
    isPaid: ctx.isPaid,
    lead: ctx.lead,
    error: ctx.lastError,
    report: renderReport(ctx, pricing),
  };
}
