import { Router } from 'express';
import { getDrawing, getDrawingResults, listDrawings, listPrizes } from '../controllers/drawingController';
import { getMyTickets, purchaseTickets } from '../controllers/ticketController';
import { authMiddleware } from '../middleware/auth';

const router = Router();

// All drawing routes require authentication
router.use(authMiddleware);

router.get('/', listDrawings);
router.get('/:drawingId', getDrawing);
router.get('/:drawingId/prizes', listPrizes);
router.get('/:drawingId/results', getDrawingResults);
router.post('/:drawingId/tickets', purchaseTickets);
router.get('/:drawingId/tickets', getMyTickets);

export default router;
