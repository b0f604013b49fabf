import { Response } from 'express';
import { z } from 'zod';
import { AuthRequest, requireUser } from '../middleware/auth';
import { failRequest } from '../middleware/errorHandler';
import { getServices } from '../services';
import { idParam, parseInput } from '../utils/validation';

const AwardBody = z.object({
  user_id: z.number().int().positive(),
  amount: z.number().int().positive(),
  reason: z.string().trim().min(1),
});

const AdjustBody = z.object({
  user_id: z.number().int().positive(),
  amount: z
    .number()
    .int()
    .refine((value) => value !== 0, { message: 'amount must not be zero' }),
  reason: z.string().trim().min(1),
});

const ReviewQuery = z.object({
  status: z.enum(['open', 'dismissed', 'actioned']).default('open'),
});

const ResolveBody = z.object({
  resolution: z.enum(['dismissed', 'actioned']),
});

// Uncapped manual grant, recorded against the admin
export const awardPoints = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const admin = requireUser(req);
    const body = parseInput(AwardBody, req.body);
    const outcome = await getServices().points.awardPoints(
      body.user_id,
      'manual_award',
      body.amount,
      body.reason,
      `admin:${admin.id}`
    );
    res.status(201).json({ success: true, data: outcome });
  } catch (error) {
    failRequest(res, error);
  }
};

export const adjustPoints = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const admin = requireUser(req);
    const body = parseInput(AdjustBody, req.body);
    const entry = await getServices().ledger.adjustPoints(body.user_id, body.amount, body.reason, admin.id);
    res.status(201).json({ success: true, data: entry });
  } catch (error) {
    failRequest(res, error);
  }
};

export const verifyLedger = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const userId = parseInput(idParam, req.params.userId);
    const verification = await getServices().ledger.verifyAccount(userId);
    res.status(200).json({ success: true, data: verification });
  } catch (error) {
    failRequest(res, error);
  }
};

export const listReviewItems = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const { status } = parseInput(ReviewQuery, req.query);
    const items = await getServices().guard.listReviewItems(status);
    res.status(200).json({ success: true, data: items, count: items.length });
  } catch (error) {
    failRequest(res, error);
  }
};

export const resolveReviewItem = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const admin = requireUser(req);
    const reviewId = parseInput(idParam, req.params.reviewId);
    const { resolution } = parseInput(ResolveBody, req.body);
    const item = await getServices().guard.resolveReviewItem(reviewId, resolution, admin.id);
    res.status(200).json({ success: true, data: item });
  } catch (error) {
    failRequest(res, error);
  }
};
