import { timingSafeEqual } from 'crypto';
import { NextFunction, Request, Response, Router } from 'express';
import { NotFoundError, UnauthorizedError, ValidationError } from '../errors';
import { ordersToCsv } from '../orders/csv';
import { isOrderStatus, ORDER_STATUSES, OrderStore } from '../orders/store';

function passwordMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function adminRoutes(orders: OrderStore, adminPassword: string | undefined): Router {
  const router = Router();

  // Password gate
  router.use((req: Request, res: Response, next: NextFunction) => {
    if (!adminPassword) {
      return next(new UnauthorizedError('Admin access is not configured'));
    }
    const given = req.get('x-admin-password');
    if (!given || !passwordMatches(given, adminPassword)) {
      return next(new UnauthorizedError());
    }
    next();
  });

  router.get('/orders', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ orders: orders.listOrders() });
    } catch (error) {
      next(error);
    }
  });

  // Export orders to CSV
  router.get('/orders/export/csv', (req: Request, res: Response, next: NextFunction) => {
    try {
      const csv = ordersToCsv(orders.listOrders());
      res.setHeader('Content-Type', 'text/csv');
      res.setHeader('Content-Disposition', 'attachment; filename="orders.csv"');
      res.send(csv);
    } catch (error) {
      next(error);
    }
  });

  // Update order status
  router.patch('/orders/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = Number(req.params.id);
      if (!Number.isInteger(id) || id <= 0) {
        throw new ValidationError('Order id must be a positive integer');
      }
      const { status } = req.body ?? {};
      if (!isOrderStatus(status)) {
        throw new ValidationError(`Status must be one of: ${ORDER_STATUSES.join(', ')}`);
      }
      if (!orders.updateStatus(id, status)) {
        throw new NotFoundError('Order not found');
      }
      res.json({ success: true, order: orders.getOrder(id) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
