import { Response } from 'express';
import { z } from 'zod';
import { MAX_TICKETS_PER_PURCHASE } from '../constants/drawingRules';
import { AuthRequest, requireUser } from '../middleware/auth';
import { failRequest } from '../middleware/errorHandler';
import { getServices } from '../services';
import { idParam, parseInput } from '../utils/validation';

const PurchaseBody = z.object({
  quantity: z.coerce.number().int().min(1).max(MAX_TICKETS_PER_PURCHASE),
});

// Buy tickets for a drawing with points
export const purchaseTickets = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const drawingId = parseInput(idParam, req.params.drawingId);
    const { quantity } = parseInput(PurchaseBody, req.body);

    const purchase = await getServices().tickets.purchaseTickets(user.id, drawingId, quantity);

    res.status(201).json({
      success: true,
      message: `Purchased ${purchase.quantity} ticket(s)`,
      data: purchase,
    });
  } catch (error) {
    failRequest(res, error);
  }
};

// List the signed-in user's tickets for a drawing
export const getMyTickets = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const drawingId = parseInput(idParam, req.params.drawingId);
    const tickets = await getServices().tickets.listUserTickets(user.id, drawingId);

    res.status(200).json({
      success: true,
      data: tickets,
      count: tickets.length,
    });
  } catch (error) {
    failRequest(res, error);
  }
};
