import type { Request, Response, NextFunction, RequestHandler } from 'express';

export const API_KEY_HEADER = 'x-ledger-api-key';

function providedKey(req: Request): string | null {
  const header = req.headers[API_KEY_HEADER];
  if (typeof header === 'string' && header) return header;

  const authorization = req.headers['authorization'];
  return authorization?.startsWith('Bearer ') ? authorization.substring(7) : null;
}

/**
 * Guards a router with a shared API key. `label` names the key in log lines
 * and error bodies ("public", "admin").
 */
export function requireApiKey(expectedKey: string | undefined, label: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) {
      console.error(`[ApiKeyAuth] ${label} API key not configured`);
      res.status(500).json({ success: false, error: { code: 'SERVER_MISCONFIGURED', message: 'Server configuration error' } });
      return;
    }

    const key = providedKey(req);
    if (!key) {
      res.status(401).json({
        success: false,
        error: {
          code: 'UNAUTHORIZED',
          message: `${label} API key required. Provide ${API_KEY_HEADER} header or Authorization: Bearer <key>`,
        },
      });
      return;
    }

    if (key !== expectedKey) {
      res.status(403).json({ success: false, error: { code: 'FORBIDDEN', message: `Invalid ${label} API key` } });
      return;
    }

    next();
  };
}
