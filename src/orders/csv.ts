import { Order } from './store';

const HEADER = 'ID,Date,Document No,Document,Customer,Contact,Status,Context';

function cell(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

export function ordersToCsv(orders: Order[]): string {
  const rows = orders.map((order) =>
    [
      order.id,
      order.request_date,
      order.doc_no,
      order.doc_name,
      order.customer_name,
      order.contact_info,
      order.status,
      order.stage_context,
    ]
      .map(cell)
      .join(','),
  );
  return [HEADER, ...rows].join('\n') + '\n';
}
