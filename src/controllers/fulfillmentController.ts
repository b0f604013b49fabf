import { Response } from 'express';
import { z } from 'zod';
import { AuthRequest, requireUser } from '../middleware/auth';
import { failRequest } from '../middleware/errorHandler';
import { getServices } from '../services';
import { idParam, parseInput } from '../utils/validation';

const AddressBody = z.object({
  street: z.string(),
  city: z.string(),
  state: z.string(),
  zip_code: z.string(),
});

const EventBody = z.discriminatedUnion('type', [
  z.object({ type: z.literal('notify') }),
  z.object({ type: z.literal('confirm_address'), address: AddressBody }),
  z.object({ type: z.literal('mark_invalid_address'), reason: z.string().optional() }),
  z.object({ type: z.literal('ship'), carrier: z.string().min(1), tracking_number: z.string().min(1) }),
  z.object({ type: z.literal('deliver') }),
  z.object({ type: z.literal('sweep_timeout') }),
]);

const STATUSES = [
  'pending',
  'winner_notified',
  'address_confirmed',
  'address_invalid',
  'shipped',
  'delivered',
  'forfeited',
] as const;

const ListQuery = z.object({
  status: z.enum(STATUSES).optional(),
  drawing_id: z.coerce.number().int().positive().optional(),
  user_id: z.coerce.number().int().positive().optional(),
});

// Prizes won by the signed-in user
export const getMyFulfillments = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const fulfillments = await getServices().fulfillment.listFulfillments({ userId: user.id });
    res.status(200).json({ success: true, data: fulfillments, count: fulfillments.length });
  } catch (error) {
    failRequest(res, error);
  }
};

// Winner submits their shipping address
export const confirmMyAddress = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const fulfillmentId = parseInput(idParam, req.params.fulfillmentId);
    const address = parseInput(AddressBody, req.body);
    const fulfillment = await getServices().fulfillment.confirmAddress(user.id, fulfillmentId, address);

    res.status(200).json({
      success: true,
      message: 'Shipping address confirmed',
      data: fulfillment,
    });
  } catch (error) {
    failRequest(res, error);
  }
};

///// admin

export const listFulfillments = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const query = parseInput(ListQuery, req.query);
    const fulfillments = await getServices().fulfillment.listFulfillments({
      userId: query.user_id,
      drawingId: query.drawing_id,
      status: query.status ? [query.status] : undefined,
    });
    res.status(200).json({ success: true, data: fulfillments, count: fulfillments.length });
  } catch (error) {
    failRequest(res, error);
  }
};

export const getFulfillment = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const fulfillmentId = parseInput(idParam, req.params.fulfillmentId);
    const fulfillment = await getServices().fulfillment.getFulfillment(fulfillmentId);
    res.status(200).json({ success: true, data: fulfillment });
  } catch (error) {
    failRequest(res, error);
  }
};

export const advanceFulfillment = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const fulfillmentId = parseInput(idParam, req.params.fulfillmentId);
    const event = parseInput(EventBody, req.body);
    const fulfillment = await getServices().fulfillment.advanceFulfillment(fulfillmentId, event);
    res.status(200).json({ success: true, data: fulfillment });
  } catch (error) {
    failRequest(res, error);
  }
};

export const notifyWinners = async (_req: AuthRequest, res: Response): Promise<void> => {
  try {
    const summary = await getServices().fulfillment.notifyPendingWinners();
    res.status(200).json({ success: true, data: summary });
  } catch (error) {
    failRequest(res, error);
  }
};

export const sweepTimeouts = async (_req: AuthRequest, res: Response): Promise<void> => {
  try {
    const summary = await getServices().fulfillment.sweepTimeouts();
    res.status(200).json({ success: true, data: summary });
  } catch (error) {
    failRequest(res, error);
  }
};
