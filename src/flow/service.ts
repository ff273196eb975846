import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AnalysisClient } from '../analysis/client';
import { AnalysisError, Stage } from '../analysis/types';
import { ConflictError, errorMessage, Result, ValidationError } from '../errors';
import { Notifier } from '../notify/mailer';
import { OrderStore } from '../orders/store';
import { PaymentGateway } from '../payment/gateway';
import {
  acceptDisclaimer,
  attachDocument,
  beginAnalysis,
  closeLead,
  completeAnalysis,
  confirmPayment,
  contactInfo,
  failAnalysis,
  FlowError,
  LeadAction,
  LeadFields,
  leadSubmitted,
  openLead,
  SessionContext,
  selectStage,
  stageContext,
  UploadedDocument,
  validateLead,
} from './machine';
import { Pricing } from './report';
import { SessionRegistry } from './sessions';

export interface FlowServiceDeps {
  sessions: SessionRegistry;
  analysis: AnalysisClient;
  orders: OrderStore;
  notifier: Notifier;
  payments: PaymentGateway;
  pricing: Pricing;
  defaultApiKey?: string;
}

export class AnalysisFailedError extends Error {
  constructor(
    readonly analysisError: AnalysisError,
    readonly session: SessionContext,
  ) {
    super(analysisError.message);
    this.name = 'AnalysisFailedError';
  }
}

export class PaymentFailedError extends Error {}

function unwrap<T>(result: Result<T, FlowError>): T {
  if (result.ok) return result.value;
  if (result.error.kind === 'Conflict') throw new ConflictError(result.error.message);
  throw new ValidationError(result.error.message);
}

/**
 * Runs the side effects around the pure transitions in `machine.ts` and keeps
 * the session registry current.
 */
export class FlowService {
  // Session ids with a payment or lead submission awaiting a remote answer.
  private busy: Set<string> = new Set();

  constructor(private deps: FlowServiceDeps) {}

  get pricing(): Pricing {
    return this.deps.pricing;
  }

  create(): SessionContext {
    return this.deps.sessions.create();
  }

  get(id: string): SessionContext {
    return this.deps.sessions.get(id);
  }

  end(id: string): boolean {
    return this.deps.sessions.delete(id);
  }

  acceptDisclaimer(id: string): SessionContext {
    return this.apply(id, (ctx) => acceptDisclaimer(ctx));
  }

  selectStage(id: string, stage: Stage): SessionContext {
    return this.apply(id, (ctx) => selectStage(ctx, stage));
  }

  attachDocument(id: string, document: UploadedDocument): SessionContext {
    return this.apply(id, (ctx) => attachDocument(ctx, document));
  }

  async analyze(id: string, apiKey?: string): Promise<SessionContext> {
    const key = apiKey?.trim() || this.deps.defaultApiKey;
    const analyzing = this.apply(id, (ctx) => beginAnalysis(ctx, key));
    if (analyzing.state.name !== 'Analyzing' || !key) {
      throw new ConflictError('Analysis did not start');
    }
    const { stage, document } = analyzing.state;

    let tmpDir: string | undefined;
    try {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deed-'));
      const tmpPath = path.join(tmpDir, 'document.pdf');
      await fs.writeFile(tmpPath, document.bytes);
      const result = await this.deps.analysis.analyze({ filePath: tmpPath, stage, apiKey: key });
      if (!result.ok) {
        console.error(`Analysis failed (${result.error.kind}):`, result.error.message);
        const failed = this.apply(id, (ctx) => failAnalysis(ctx, result.error));
        throw new AnalysisFailedError(result.error, failed);
      }
      return this.apply(id, (ctx) => completeAnalysis(ctx, result.value));
    } catch (error) {
      // Anything thrown before the client answered still has to release the session.
      const current = this.deps.sessions.get(id);
      if (current.state.name === 'Analyzing') {
        this.apply(id, (ctx) => failAnalysis(ctx, { kind: 'Other', message: errorMessage(error) }));
      }
      throw error;
    } finally {
      if (tmpDir) await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }

  async unlock(id: string): Promise<SessionContext> {
    const ctx = this.get(id);
    if (ctx.state.name === 'Unlocked') return ctx;
    if (ctx.state.name !== 'Locked') throw new ValidationError('There is no report to unlock');

    return this.exclusive(id, async () => {
      const charge = await this.deps.payments.charge(this.deps.pricing.unlock);
      if (!charge.ok) {
        throw new PaymentFailedError(charge.error.message);
      }
      return this.apply(id, (current) => confirmPayment(current, charge.value));
    });
  }

  openLead(id: string, action: LeadAction): SessionContext {
    return this.apply(id, (ctx) => openLead(ctx, action));
  }

  closeLead(id: string): SessionContext {
    return this.apply(id, (ctx) => closeLead(ctx));
  }

  /**
   * Stores the order, then sends the confirmation. A failed email does not
   * fail the request; a failed insert does, and the form stays open.
   */
  async submitLead(id: string, fields: Partial<Record<keyof LeadFields, unknown>>): Promise<SessionContext> {
    const ctx = this.get(id);
    if (ctx.lead?.status !== 'open') throw new ValidationError('There is no open request form');
    const lead = unwrap(validateLead(fields));
    const { context } = ctx.lead;

    return this.exclusive(id, async () => {
      const orderId = this.deps.orders.createOrder(
        context.docNo,
        context.docName,
        lead.name,
        contactInfo(lead),
        stageContext(context),
      );
      console.log(`Order ${orderId} created (${stageContext(context)})`);

      const emailSent = await this.deps.notifier.sendConfirmation(lead.email, lead.name, context.docName);
      return this.apply(id, (current) => leadSubmitted(current, orderId, emailSent));
    });
  }

  // A second payment or submission while one is pending is a 409.
  private async exclusive<T>(id: string, action: () => Promise<T>): Promise<T> {
    if (this.busy.has(id)) {
      throw new ConflictError('Another request is still being processed for this session');
    }
    this.busy.add(id);
    try {
      return await action();
    } finally {
      this.busy.delete(id);
    }
  }

  private apply(id: string, transition: (ctx: SessionContext) => Result<SessionContext, FlowError>): SessionContext {
    const next = unwrap(transition(this.deps.sessions.get(id)));
    return this.deps.sessions.save(next);
  }
}
