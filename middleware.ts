import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { Ratelimit } from '@upstash/ratelimit';
import { Redis } from '@upstash/redis';

// Upstash Redis (edge) for rate limiting
const redis = process.env.UPSTASH_REDIS_REST_URL && process.env.UPSTASH_REDIS_REST_TOKEN
  ? new Redis({ url: process.env.UPSTASH_REDIS_REST_URL, token: process.env.UPSTASH_REDIS_REST_TOKEN })
  : null;

const limiterDefault = redis ? new Ratelimit({ redis, limiter: Ratelimit.slidingWindow(60, '1 m') }) : null; // 60 req/min/IP default
const limiterInference = redis ? new Ratelimit({ redis, limiter: Ratelimit.slidingWindow(10, '1 m') }) : null; // model-backed endpoints

// Routes that call the forecaster or GI regressor
const INFERENCE_ROUTES = ['/api/glucose-stats', '/api/scan/analyze'];

function getClientIp(req: NextRequest) {
  return (
    req.headers.get('x-forwarded-for')?.split(',')[0]?.trim() ||
    req.headers.get('x-real-ip') ||
    req.ip ||
    '0.0.0.0'
  );
}

function isInferenceRoute(pathname: string) {
  return INFERENCE_ROUTES.some((route) => pathname === route || pathname.startsWith(route + '/'));
}

export async function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;
  if (!pathname.startsWith('/api/')) return NextResponse.next();

  const ip = getClientIp(request);
  let result: { success: boolean } | null = null;
  if (isInferenceRoute(pathname)) {
    if (limiterInference) result = await limiterInference.limit(`inference:${ip}`);
  } else if (limiterDefault) {
    result = await limiterDefault.limit(`api:${ip}`);
  }

  if (result && !result.success) {
    return NextResponse.json({ error: 'Too many requests' }, { status: 429 });
  }
  return NextResponse.next();
}

export const config = {
  matcher: '/api/:path*',
};
