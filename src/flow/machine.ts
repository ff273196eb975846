import { AnalysisError, AnalysisResult, Stage, UNCONFIRMED_DOC_NO } from '../analysis/types';
import { err, ok, Result } from '../errors';
import { Receipt } from '../payment/gateway';

export interface UploadedDocument {
  originalName: string;
  size: number;
  bytes: Buffer;
}

export type FlowState =
  | { name: 'AwaitingDisclaimer' }
  | { name: 'AwaitingStageSelection' }
  | { name: 'AwaitingUpload'; stage: Stage }
  | { name: 'Ready'; stage: Stage; document: UploadedDocument }
  | { name: 'Analyzing'; stage: Stage; document: UploadedDocument }
  | { name: 'Locked'; stage: Stage; document: UploadedDocument; result: AnalysisResult }
  | { name: 'Unlocked'; stage: Stage; document: UploadedDocument; result: AnalysisResult };

export type FlowStateName = FlowState['name'];

type ReportState = Extract<FlowState, { name: 'Locked' | 'Unlocked' }>;

// paid-order: a numbered deed we can fetch a certified copy of.
// free-inquiry: doc_no is "N/A", so we first confirm it exists.
// manual-search: one request covering every gap in the report.
export type LeadPath = 'paid-order' | 'free-inquiry' | 'manual-search';

export interface LeadContext {
  path: LeadPath;
  stage: Stage;
  docName: string;
  docNo?: string;
}

export type LeadState =
  | { status: 'open'; context: LeadContext }
  | { status: 'submitted'; context: LeadContext; orderId: number; emailSent: boolean };

export interface SessionContext {
  id: string;
  state: FlowState;
  isPaid: boolean;
  receipt: Receipt | null;
  lead: LeadState | null;
  lastError: AnalysisError | null;
}

export type FlowError = { kind: 'Validation' | 'Conflict'; message: string };

export type Transition = Result<SessionContext, FlowError>;

export type LeadAction = { type: 'document'; index: number } | { type: 'bulk' };

export interface LeadFields {
  name: string;
  email: string;
  phone: string;
}

const invalid = (message: string): Transition => err<FlowError>({ kind: 'Validation', message });
const busy = (): Transition => err<FlowError>({ kind: 'Conflict', message: 'An analysis is already running for this session' });

function hasDocument(state: FlowState): state is Extract<FlowState, { document: UploadedDocument }> {
  return 'document' in state;
}

function hasStage(state: FlowState): state is Extract<FlowState, { stage: Stage }> {
  return 'stage' in state;
}

export function isReportState(state: FlowState): state is ReportState {
  return state.name === 'Locked' || state.name === 'Unlocked';
}

export function createSession(id: string): SessionContext {
  return { id, state: { name: 'AwaitingDisclaimer' }, isPaid: false, receipt: null, lead: null, lastError: null };
}

export function acceptDisclaimer(ctx: SessionContext): Transition {
  if (ctx.state.name !== 'AwaitingDisclaimer') return ok(ctx);
  return ok({ ...ctx, state: { name: 'AwaitingStageSelection' } });
}

export function selectStage(ctx: SessionContext, stage: Stage): Transition {
  const { state } = ctx;
  if (state.name === 'AwaitingDisclaimer') return invalid('Please accept the disclaimer first');
  if (state.name === 'Analyzing') return busy();

  const next: FlowState = hasDocument(state)
    ? { name: 'Ready', stage, document: state.document }
    : { name: 'AwaitingUpload', stage };
  return ok({ ...ctx, state: next, lead: null, lastError: null });
}

export function attachDocument(ctx: SessionContext, document: UploadedDocument): Transition {
  const { state } = ctx;
  if (state.name === 'AwaitingDisclaimer') return invalid('Please accept the disclaimer first');
  if (state.name === 'Analyzing') return busy();
  if (!hasStage(state)) return invalid('Please select your purchase stage first');

  return ok({ ...ctx, state: { name: 'Ready', stage: state.stage, document }, lead: null, lastError: null });
}

/**
 * Ready, Locked or Unlocked → Analyzing. The paywall resets on every new
 * analysis, so a second deed in the same session has to be unlocked again.
 */
export function beginAnalysis(ctx: SessionContext, apiKey: string | undefined): Transition {
  const { state } = ctx;
  if (state.name === 'Analyzing') return busy();
  if (!hasDocument(state)) return invalid('Please upload a PDF document first');
  if (!apiKey || apiKey.trim() === '') return invalid('Please enter an API key');

  return ok({
    ...ctx,
    state: { name: 'Analyzing', stage: state.stage, document: state.document },
    isPaid: false,
    receipt: null,
    lead: null,
    lastError: null,
  });
}

// A chain with no gaps is shown in full and never gated.
export function completeAnalysis(ctx: SessionContext, result: AnalysisResult): Transition {
  const { state } = ctx;
  if (state.name !== 'Analyzing') return invalid('No analysis is running');

  const { stage, document } = state;
  const next: FlowState =
    result.missing_docs.length === 0
      ? { name: 'Unlocked', stage, document, result }
      : { name: 'Locked', stage, document, result };
  return ok({ ...ctx, state: next });
}

export function failAnalysis(ctx: SessionContext, error: AnalysisError): Transition {
  const { state } = ctx;
  if (state.name !== 'Analyzing') return invalid('No analysis is running');

  return ok({ ...ctx, state: { name: 'Ready', stage: state.stage, document: state.document }, lastError: error });
}

export function confirmPayment(ctx: SessionContext, receipt: Receipt): Transition {
  const { state } = ctx;
  if (state.name === 'Unlocked') return ok(ctx);
  if (state.name !== 'Locked') return invalid('There is no report to unlock');

  const { stage, document, result } = state;
  return ok({ ...ctx, state: { name: 'Unlocked', stage, document, result }, isPaid: true, receipt });
}

export function openLead(ctx: SessionContext, action: LeadAction): Transition {
  const { state } = ctx;
  if (!isReportState(state)) return invalid('Run an analysis before requesting documents');

  const missing = state.result.missing_docs;
  let context: LeadContext;

  if (action.type === 'bulk') {
    context = {
      path: 'manual-search',
      stage: state.stage,
      docName: missing.length > 0 ? `All missing documents (${missing.length})` : 'Manual registry search',
    };
  } else {
    // Per-document details stay behind the paywall.
    if (state.name !== 'Unlocked') return invalid('Unlock the report to request individual documents');
    const doc = missing[action.index];
    if (!doc) return invalid(`No missing document at position ${action.index}`);

    const docName = `${doc.year} ${doc.doc_type}`;
    context =
      doc.doc_no === UNCONFIRMED_DOC_NO
        ? { path: 'free-inquiry', stage: state.stage, docName }
        : { path: 'paid-order', stage: state.stage, docName, docNo: doc.doc_no };
  }

  return ok({ ...ctx, lead: { status: 'open', context } });
}

export function validateLead(fields: Partial<Record<keyof LeadFields, unknown>>): Result<LeadFields, FlowError> {
  const read = (value: unknown) => (typeof value === 'string' ? value.trim() : '');
  const lead = { name: read(fields.name), email: read(fields.email), phone: read(fields.phone) };

  const required: Array<keyof LeadFields> = ['name', 'email', 'phone'];
  const missing = required.filter((key) => lead[key] === '');
  if (missing.length > 0) {
    return err<FlowError>({ kind: 'Validation', message: `Please fill in: ${missing.join(', ')}` });
  }
  return ok(lead);
}

export function leadSubmitted(ctx: SessionContext, orderId: number, emailSent: boolean): Transition {
  if (ctx.lead?.status !== 'open') return invalid('There is no open request form');
  return ok({ ...ctx, lead: { status: 'submitted', context: ctx.lead.context, orderId, emailSent } });
}

export function closeLead(ctx: SessionContext): Transition {
  return ok({ ...ctx, lead: null });
}

export function stageContext(context: LeadContext): string {
  return `${context.stage} / ${context.path}`;
}

export function contactInfo(fields: LeadFields): string {
  return `${fields.phone} | ${fields.email}`;
}
