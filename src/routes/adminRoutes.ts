import { Router } from 'express';
import { adjustPoints, awardPoints, listReviewItems, resolveReviewItem, verifyLedger } from '../controllers/adminController';
import {
  addPrize,
  cancelDrawing,
  closeDrawing,
  createDrawing,
  executeDrawing,
  getExecutionRecord,
  openDrawing,
  scheduleDrawing,
  verifyExecution,
} from '../controllers/drawingController';
import {
  advanceFulfillment,
  getFulfillment,
  listFulfillments,
  notifyWinners,
  sweepTimeouts,
} from '../controllers/fulfillmentController';
import { adminAuthMiddleware } from '../middleware/auth';

const router = Router();

// All admin routes require an admin token
router.use(adminAuthMiddleware);

// Points
router.post('/points/award', awardPoints);
router.post('/points/adjust', adjustPoints);
router.get('/points/:userId/verify', verifyLedger);

// Review queue
router.get('/reviews', listReviewItems);
router.post('/reviews/:reviewId/resolve', resolveReviewItem);

// Drawings
router.post('/drawings', createDrawing);
router.post('/drawings/:drawingId/prizes', addPrize);
router.post('/drawings/:drawingId/schedule', scheduleDrawing);
router.post('/drawings/:drawingId/open', openDrawing);
router.post('/drawings/:drawingId/close', closeDrawing);
router.post('/drawings/:drawingId/cancel', cancelDrawing);
router.post('/drawings/:drawingId/execute', executeDrawing);
router.get('/drawings/:drawingId/execution', getExecutionRecord);
router.get('/drawings/:drawingId/verify', verifyExecution);

// Fulfillment
router.get('/fulfillments', listFulfillments);
router.get('/fulfillments/:fulfillmentId', getFulfillment);
router.post('/fulfillments/:fulfillmentId/events', advanceFulfillment);
router.post('/fulfillments/notify', notifyWinners);
router.post('/fulfillments/sweep', sweepTimeouts);

export default router;
