import { Request, Response, NextFunction } from 'express';
import { verifyToken, DecodedToken, UserRole } from '../utils/auth';
import { AuthError } from '../utils/errors';

export interface AuthRequest extends Request {
  user?: DecodedToken;
}

const authenticate = (req: AuthRequest, roles: UserRole[]): DecodedToken => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new AuthError(401, 'No token provided');
  }

  const token = authHeader.substring(7); // Remove 'Bearer ' prefix
  let decoded: DecodedToken;
  try {
    decoded = verifyToken(token);
  } catch {
    throw new AuthError(401, 'Invalid or expired token');
  }

  if (!roles.includes(decoded.role)) {
    throw new AuthError(403, 'Admin access required');
  }
  return decoded;
};

// Any signed-in account; admins may use member routes too.
export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    req.user = authenticate(req, ['user', 'admin']);
    next();
  } catch (error) {
    next(error);
  }
};

export const adminAuthMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    req.user = authenticate(req, ['admin']);
    next();
  } catch (error) {
    next(error);
  }
};

export const requireUser = (req: AuthRequest): DecodedToken => {
  if (!req.user) {
    throw new AuthError(401, 'No token provided');
  }
  return req.user;
};
