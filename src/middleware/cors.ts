import cors from 'cors';
import { AppError } from '../errors.js';

function isAllowedDevOrigin(origin: string): boolean {
  return /^https?:\/\/localhost:\d+$/i.test(origin) || /^https?:\/\/127\.0\.0\.1:\d+$/i.test(origin);
}

export function createCorsMiddleware(allowedOrigins: string[]) {
  return cors({
    origin: (origin, callback) => {
      // Allow server-to-server, CLI and curl requests with no Origin header.
      if (!origin) {
        callback(null, true);
        return;
      }

      if (allowedOrigins.includes(origin) || isAllowedDevOrigin(origin)) {
        callback(null, true);
        return;
      }

      callback(new AppError(`CORS blocked origin: ${origin}`, 'CORS_BLOCKED', 403));
    },
    methods: ['GET', 'POST'],
  });
}
