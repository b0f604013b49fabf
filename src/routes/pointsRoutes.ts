import { Router } from 'express';
import { getMyBalance, getMyLedger } from '../controllers/pointsController';
import { authMiddleware } from '../middleware/auth';

const router = Router();

router.use(authMiddleware);

router.get('/balance', getMyBalance);
router.get('/ledger', getMyLedger);

export default router;
