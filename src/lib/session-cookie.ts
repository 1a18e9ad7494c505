import type { NextRequest, NextResponse } from 'next/server';
import type { EnvConfig } from '@/lib/config';

type CookieSettings = Pick<EnvConfig, 'SESSION_COOKIE_NAME' | 'SESSION_MAX_AGE_MS'>;

/** Raw cookie value. Callers must still confirm the session with SessionRegistry. */
export function readSessionCookie(request: NextRequest, settings: CookieSettings): string | undefined {
  return request.cookies.get(settings.SESSION_COOKIE_NAME)?.value;
}

export function attachSessionCookie(
  response: NextResponse,
  sessionId: string,
  settings: CookieSettings,
): void {
  response.cookies.set({
    name: settings.SESSION_COOKIE_NAME,
    value: sessionId,
    httpOnly: true,
    sameSite: 'lax',
    path: '/',
    maxAge: Math.floor(settings.SESSION_MAX_AGE_MS / 1000),
  });
}

export function clearSessionCookie(response: NextResponse, settings: CookieSettings): void {
  response.cookies.delete({ name: settings.SESSION_COOKIE_NAME, path: '/' });
}
