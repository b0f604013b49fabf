import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';

export type UserRole = 'user' | 'admin';

export interface TokenPayload {
  id: number;
  role: UserRole;
  email?: string;
}

export interface DecodedToken extends TokenPayload {
  iat?: number;
  exp?: number;
}

const DecodedTokenSchema = z.object({
  id: z.number().int().positive(),
  role: z.enum(['user', 'admin']),
  email: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

interface AuthSettings {
  secret: string;
  expiresIn: string;
}

let settings: AuthSettings | null = null;

export const configureAuth = (next: AuthSettings): void => {
  settings = next;
};

const currentSettings = (): AuthSettings => {
  if (!settings) {
    throw new Error('Authentication is not configured');
  }
  return settings;
};

export const generateToken = (payload: TokenPayload): string => {
  const { secret, expiresIn } = currentSettings();
  return jwt.sign(payload, secret, {
    expiresIn,
  } as SignOptions);
};

export const verifyToken = (token: string): DecodedToken => {
  const { secret } = currentSettings();
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch (error) {
    throw new Error('Invalid or expired token', { cause: error });
  }
  const parsed = DecodedTokenSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('Invalid or expired token');
  }
  return parsed.data;
};
