/**
 * HTTP Basic authentication helpers
 */

import { DASHBOARD_TITLE } from '../config/config.js';

export interface BasicCredentials {
  username: string;
  password: string;
}

export function extractBasicCredentials(request: Request): BasicCredentials | null {
  const header = request.headers.get('Authorization');
  if (!header) {
    return null;
  }

  const match = /^Basic\s+(\S+)$/i.exec(header.trim());
  if (!match) {
    return null;
  }

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return null;
  }

  return {
    username: decoded.substring(0, separator),
    password: decoded.substring(separator + 1),
  };
}

export function unauthorizedResponse(message: string): Response {
  return new Response(JSON.stringify({ error: 'Unauthorized', message }), {
    status: 401,
    headers: {
      'Content-Type': 'application/json',
      'WWW-Authenticate': `Basic realm="${DASHBOARD_TITLE}", charset="UTF-8"`,
    },
  });
}
