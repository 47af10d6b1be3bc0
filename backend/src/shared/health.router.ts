import { Router } from 'express';
import { DateTime } from 'luxon';

const router = Router();

router.get('/', (_req, res) => {
  res.json({ status: 'healthy', timestamp: DateTime.now().toISO() });
});

export { router as healthRouter };
