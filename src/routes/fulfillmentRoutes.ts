import { Router } from 'express';
import { confirmMyAddress, getMyFulfillments } from '../controllers/fulfillmentController';
import { authMiddleware } from '../middleware/auth';

const router = Router();

router.use(authMiddleware);

router.get('/', getMyFulfillments);
router.put('/:fulfillmentId/address', confirmMyAddress);

export default router;
