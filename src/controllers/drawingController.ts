import { Response } from 'express';
import { z } from 'zod';
import { AuthRequest, requireUser } from '../middleware/auth';
import { failRequest } from '../middleware/errorHandler';
import { getServices } from '../services';
import { idParam, pageQuery, parseInput } from '../utils/validation';

const DrawingTypeEnum = z.enum(['daily', 'weekly', 'monthly', 'annual']);

const PrizeBody = z.object({
  rank: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string().optional(),
  value_usd: z.number().nonnegative().optional(),
  quantity: z.number().int().positive().optional(),
  fulfillment_type: z.enum(['digital', 'physical']).optional(),
});

const DrawingListQuery = pageQuery.extend({
  status: z.enum(['draft', 'scheduled', 'open', 'closed', 'completed', 'cancelled']).optional(),
  drawing_type: DrawingTypeEnum.optional(),
});

const CreateDrawingBody = z.object({
  drawing_type: DrawingTypeEnum,
  name: z.string().min(1),
  open_time: z.coerce.date(),
  draw_time: z.coerce.date(),
  ticket_cost: z.number().int().positive().optional(),
  winner_count: z.number().int().positive().optional(),
  prizes: z.array(PrizeBody).optional(),
});

const CloseBody = z.object({
  force: z.boolean().default(false),
});

export const listDrawings = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const { status, drawing_type, limit, offset } = parseInput(DrawingListQuery, req.query);
    const drawings = await getServices().drawings.listDrawings({ status, drawing_type }, { limit, offset });
    res.status(200).json({ success: true, count: drawings.length, data: drawings });
  } catch (error) {
    failRequest(res, error);
  }
};

export const getDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const drawing = await getServices().drawings.getDrawing(drawingId);
    res.status(200).json({ success: true, data: drawing });
  } catch (error) {
    failRequest(res, error);
  }
};

export const getDrawingResults = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const results = await getServices().drawings.getResults(drawingId);
    res.status(200).json({ success: true, data: results });
  } catch (error) {
    failRequest(res, error);
  }
};

export const listPrizes = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const prizes = await getServices().drawings.listPrizes(drawingId);
    res.status(200).json({ success: true, count: prizes.length, data: prizes });
  } catch (error) {
    failRequest(res, error);
  }
};

///// admin

export const createDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const admin = requireUser(req);
    const body = parseInput(CreateDrawingBody, req.body);
    const drawing = await getServices().drawings.createDrawing({ ...body, created_by: admin.id });

    res.status(201).json({
      success: true,
      message: 'Drawing created',
      data: drawing,
    });
  } catch (error) {
    failRequest(res, error);
  }
};

export const addPrize = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const body = parseInput(PrizeBody, req.body);
    const prize = await getServices().drawings.addPrize(drawingId, body);
    res.status(201).json({ success: true, message: 'Prize added', data: prize });
  } catch (error) {
    failRequest(res, error);
  }
};

export const scheduleDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const drawing = await getServices().drawings.scheduleDrawing(drawingId);
    res.status(200).json({ success: true, data: drawing });
  } catch (error) {
    failRequest(res, error);
  }
};

export const openDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const drawing = await getServices().drawings.openDrawing(drawingId);
    res.status(200).json({ success: true, data: drawing });
  } catch (error) {
    failRequest(res, error);
  }
};

export const closeDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const { force } = parseInput(CloseBody, req.body ?? {});
    const drawing = await getServices().drawings.closeDrawing(drawingId, { force });
    res.status(200).json({ success: true, data: drawing });
  } catch (error) {
    failRequest(res, error);
  }
};

export const cancelDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const drawing = await getServices().drawings.cancelDrawing(drawingId);
    res.status(200).json({ success: true, data: drawing });
  } catch (error) {
    failRequest(res, error);
  }
};

export const executeDrawing = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const record = await getServices().executor.executeDrawing(drawingId);
    res.status(200).json({ success: true, data: record });
  } catch (error) {
    failRequest(res, error);
  }
};

export const getExecutionRecord = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const record = await getServices().executor.getExecutionRecord(drawingId);
    res.status(200).json({ success: true, data: record });
  } catch (error) {
    failRequest(res, error);
  }
};

export const verifyExecution = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const drawingId = parseInput(idParam, req.params.drawingId);
    const verification = await getServices().executor.verifyExecution(drawingId);
    res.status(200).json({ success: true, data: verification });
  } catch (error) {
    failRequest(res, error);
  }
};
