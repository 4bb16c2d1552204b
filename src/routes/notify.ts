import express from 'express';
import { z } from 'zod';
import type { NotificationStore } from '../lib/notification-store.js';
import { StoreUnavailableError } from '../lib/errors.js';

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE = /^[\d\s\-+()]{10,}$/;

const notifySchema = z
  .object({
    product_name: z.string({ required_error: 'product_name is required' }).trim().min(1, 'product_name is required'),
    email: z
      .string()
      .trim()
      .refine((v) => v === '' || EMAIL.test(v), 'Invalid email address')
      .nullish(),
    phone: z
      .string()
      .trim()
      .refine((v) => v === '' || PHONE.test(v), 'Invalid phone number')
      .nullish(),
  })
  .refine((body) => Boolean(body.email || body.phone), {
    message: 'At least one of email or phone must be provided',
  });

export function createNotifyRouter(deps: { store: NotificationStore }) {
  const router = express.Router();
  router.use(express.json());

  // POST /api/notify { product_name, email?, phone? }
  router.post('/api/notify', async (req, res) => {
    const parsed = notifySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ detail: parsed.error.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    const { product_name: productName, email, phone } = parsed.data;
    try {
      const created = await deps.store.add(productName, { email: email || null, phone: phone || null });
      if (!created) {
        res.json({ ok: true, alreadySubscribed: true });
        return;
      }
      res.status(201).json({ ok: true, alreadySubscribed: false });
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        console.error('[notify] store unavailable:', err.message);
        res.status(503).json({ detail: 'Notifications are temporarily unavailable. Please try again later.' });
        return;
      }
      console.error('[notify] subscribe failed:', err instanceof Error ? err.message : String(err));
      res.status(500).json({ detail: 'An error occurred. Please try again.' });
    }
  });

  return router;
}
