import { Router } from 'express';

export const SERVICE_VERSION = '1.0.0';

const router = Router();

router.get('/', (_req, res) => {
  res.json({
    message: 'Welcome to the Interview Q&A Generator API',
    status: 'ok',
    version: SERVICE_VERSION,
  });
});

router.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

export default router;
