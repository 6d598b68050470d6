/**
 * identity.ts
 * API key authentication, caller identity and admin authorization
 */

import type { NextFunction, Request, Response } from 'express';

import { ERROR_MESSAGES } from '../constants/index.js';
import { logger } from '../utils/logger.js';

export interface IdentityConfig {
  enabled: boolean;
  apiKeys: string[];
  adminApiKeys: string[];
  /** User each key acts as; unmapped keys act as themselves */
  apiKeyUsers: Record<string, string>;
  /** Header naming the end user. Honoured with auth disabled, or for admin keys */
  userIdHeader: string;
  /** Paths that never require a key */
  publicPaths: string[];
}

export interface RequestIdentity {
  /** Key presented by the caller, when any */
  apiKey?: string;
  /** Owner recorded on tasks this request creates */
  userId: string;
  isAdmin: boolean;
}

export const ANONYMOUS_USER = 'anonymous';

// Extend Express Request type to include the caller identity
declare module 'express-serve-static-core' {
  interface Request {
    identity?: RequestIdentity;
  }
}

/**
 * Extract API key from request
 * Checks Authorization header (Bearer token) and X-API-Key header
 */
export function extractApiKey(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }

  const apiKeyHeader = req.headers['x-api-key'];
  if (typeof apiKeyHeader === 'string' && apiKeyHeader.length > 0) {
    return apiKeyHeader;
  }

  return undefined;
}

function headerUserId(req: Request, header: string): string | undefined {
  const value = req.headers[header.toLowerCase()];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function keyUserId(apiKey: string, apiKeyUsers: Record<string, string>): string {
  return Object.hasOwn(apiKeyUsers, apiKey) ? apiKeyUsers[apiKey] : apiKey;
}

function maskKey(apiKey: string): string {
  return apiKey.substring(0, 4) + '...';
}

/**
 * Attach `req.identity`. With auth enabled, rejects requests to non-public paths
 * that carry no key or an unknown key.
 */
export function authenticate(
  config: IdentityConfig
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = extractApiKey(req);
    const requestedUser = headerUserId(req, config.userIdHeader);

    if (!config.enabled) {
      req.identity = { apiKey, userId: requestedUser ?? ANONYMOUS_USER, isAdmin: false };
      next();
      return;
    }

    const isAdmin = apiKey !== undefined && config.adminApiKeys.includes(apiKey);
    const isValid = isAdmin || (apiKey !== undefined && config.apiKeys.includes(apiKey));

    if (apiKey !== undefined && isValid) {
      // Only admin keys may act for another user
      const keyUser = keyUserId(apiKey, config.apiKeyUsers);
      const userId = isAdmin ? (requestedUser ?? keyUser) : keyUser;
      req.identity = { apiKey, userId, isAdmin };
      next();
      return;
    }

    if (config.publicPaths.includes(req.path)) {
      req.identity = { userId: ANONYMOUS_USER, isAdmin: false };
      next();
      return;
    }

    if (!apiKey) {
      logger.warn(`Authentication failed: No API key provided`, { path: req.path, ip: req.ip });
      res.status(401).json({
        detail: ERROR_MESSAGES.AUTH_REQUIRED,
        type: 'authentication_required',
      });
      return;
    }

    logger.warn(`Authentication failed: Invalid API key`, {
      path: req.path,
      ip: req.ip,
      apiKey: maskKey(apiKey),
    });
    res.status(401).json({ detail: ERROR_MESSAGES.AUTH_FAILED, type: 'authentication_failed' });
  };
}

/**
 * Middleware to require admin privileges. Open to everyone when auth is disabled.
 * Use after authenticate.
 */
export function requireAdmin(
  config: Pick<IdentityConfig, 'enabled'>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!config.enabled) {
      next();
      return;
    }

    if (!req.identity?.isAdmin) {
      logger.warn(`Authorization failed: Admin access required`, {
        path: req.path,
        user: req.identity?.userId,
      });
      res.status(403).json({ detail: ERROR_MESSAGES.FORBIDDEN, type: 'forbidden' });
      return;
    }

    next();
  };
}

/**
 * Whether the caller may see every user's tasks
 */
export function canSeeAllTasks(req: Request, config: Pick<IdentityConfig, 'enabled'>): boolean {
  return config.enabled && req.identity?.isAdmin === true;
}
