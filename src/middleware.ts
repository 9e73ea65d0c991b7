import { NextRequest, NextResponse } from 'next/server'

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
}

export function middleware(request: NextRequest) {
  // Answer preflight directly
  if (request.method === 'OPTIONS') {
    return new NextResponse(null, { status: 204, headers: CORS_HEADERS })
  }

  const response = NextResponse.next()
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    response.headers.set(name, value)
  }
  return response
}

export const config = {
  matcher: ['/api/:path*'],
}
