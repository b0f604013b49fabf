import { Response } from 'express';
import { AuthRequest, requireUser } from '../middleware/auth';
import { failRequest } from '../middleware/errorHandler';
import { getServices } from '../services';
import { pageQuery, parseInput } from '../utils/validation';

// Get current balance for the signed-in user
export const getMyBalance = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const balance = await getServices().ledger.getBalance(user.id);

    res.status(200).json({
      success: true,
      data: balance,
    });
  } catch (error) {
    failRequest(res, error);
  }
};

// Get ledger history, newest first
export const getMyLedger = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const user = requireUser(req);
    const page = parseInput(pageQuery, req.query);
    const entries = await getServices().ledger.getLedgerHistory(user.id, page);

    res.status(200).json({
      success: true,
      data: entries,
      pagination: page,
    });
  } catch (error) {
    failRequest(res, error);
  }
};
