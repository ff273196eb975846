import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { StorageError } from '../errors';

export const ORDER_STATUSES = ['Pending', 'InProgress', 'Completed', 'Cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

// Stored in place of a document number when the customer only knows the gap.
export const MANUAL_SEARCH = 'MANUAL_SEARCH';

export interface Order {
  id: number;
  doc_no: string;
  doc_name: string;
  customer_name: string;
  contact_info: string;
  request_date: string;
  status: OrderStatus;
  stage_context: string;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === 'string' && ORDER_STATUSES.some((status) => status === value);
}

interface OrderRow {
  id: number;
  doc_no: string;
  doc_name: string;
  customer_name: string;
  contact_info: string;
  request_date: string;
  status: string;
  stage_context: string;
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    doc_no TEXT NOT NULL,
    doc_name TEXT NOT NULL,
    customer_name TEXT NOT NULL,
    contact_info TEXT NOT NULL,
    request_date TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'Pending',
    stage_context TEXT NOT NULL
  )
`;

function toOrder(row: OrderRow): Order {
  // Rows written before statuses were closed may hold free text.
  return { ...row, status: isOrderStatus(row.status) ? row.status : 'Pending' };
}

/**
 * The `orders` table. Inserts only; the one mutation is the status column,
 * written last-write-wins by the admin.
 */
export class OrderStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(filename: string, options: { now?: () => Date } = {}) {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.exec(CREATE_TABLE);
    this.now = options.now ?? (() => new Date());
  }

  createOrder(
    docNo: string | undefined,
    docName: string,
    customerName: string,
    contactInfo: string,
    stageContext: string,
  ): number {
    const normalizedDocNo = docNo && docNo.trim() !== '' ? docNo.trim() : MANUAL_SEARCH;
    try {
      const result = this.db
        .prepare(
          `INSERT INTO orders (doc_no, doc_name, customer_name, contact_info, request_date, status, stage_context)
           VALUES (?, ?, ?, ?, ?, 'Pending', ?)`,
        )
        .run(normalizedDocNo, docName, customerName, contactInfo, this.now().toISOString(), stageContext);
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw new StorageError('Failed to save order', error);
    }
  }

  listOrders(): Order[] {
    try {
      const rows = this.db
        .prepare<[], OrderRow>('SELECT * FROM orders ORDER BY request_date DESC, id DESC')
        .all();
      return rows.map(toOrder);
    } catch (error) {
      throw new StorageError('Failed to read orders', error);
    }
  }

  getOrder(id: number): Order | undefined {
    try {
      const row = this.db.prepare<[number], OrderRow>('SELECT * FROM orders WHERE id = ?').get(id);
      return row ? toOrder(row) : undefined;
    } catch (error) {
      throw new StorageError('Failed to read order', error);
    }
  }

  // Returns false when no order has this id.
  updateStatus(id: number, status: OrderStatus): boolean {
    try {
      const result = this.db.prepare('UPDATE orders SET status = ? WHERE id = ?').run(status, id);
      return result.changes > 0;
    } catch (error) {
      throw new StorageError('Failed to update order status', error);
    }
  }

  close(): void {
    this.db.close();
  }
}
