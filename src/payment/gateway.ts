import { randomUUID } from 'crypto';
import { ok, Result } from '../errors';

export interface Receipt {
  id: string;
  amount: number;
  currency: 'INR';
  paidAt: string;
}

export type PaymentError =
  | { kind: 'Declined'; message: string }
  | { kind: 'Unavailable'; message: string };

export interface PaymentGateway {
  charge(amount: number): Promise<Result<Receipt, PaymentError>>;
}

/**
 * Stand-in for a payment processor: waits a fixed delay and approves every
 * charge. A real processor implements {@link PaymentGateway} instead.
 */
export class SimulatedPaymentGateway implements PaymentGateway {
  constructor(
    private delayMs: number,
    private sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  ) {}

  async charge(amount: number): Promise<Result<Receipt, PaymentError>> {
    await this.sleep(this.delayMs);
    return ok({
      id: `sim_${randomUUID()}`,
      amount,
      currency: 'INR',
      paidAt: new Date().toISOString(),
    });
  }
}
