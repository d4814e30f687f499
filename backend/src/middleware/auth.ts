// Authentication middleware
import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import { config } from '../config/index.js';

export interface AuthRequest extends Request {
  user?: {
    address: string;
  };
}

const tokenClaimsSchema = z.object({ address: z.string().min(1) });

/**
 * Authenticate via API key or JWT Bearer token.
 * Only a JWT identifies a caller; the API key grants read access.
 */
export function authenticate(req: AuthRequest, res: Response, next: NextFunction) {
  // Check for API key in header
  const apiKey = req.header('x-api-key');
  if (apiKey === config.apiKey) {
    return next();
  }

  // Check for JWT Bearer token
  const authHeader = req.header('Authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.substring(7);
    try {
      const claims = tokenClaimsSchema.parse(jwt.verify(token, config.jwtSecret));
      req.user = { address: claims.address };
      return next();
    } catch {
      return res.status(401).json({ error: 'Invalid token' });
    }
  }

  return res.status(401).json({ error: 'Authentication required' });
}

/**
 * Mutating routes act on behalf of the token holder
 */
export function requireCaller(req: AuthRequest, res: Response, next: NextFunction) {
  if (!req.user) {
    return res.status(403).json({ error: 'A bearer token identifying the caller is required' });
  }
  return next();
}
