import { NextRequest } from 'next/server'
import { describe, expect, it } from 'vitest'
import { CORS_HEADERS, middleware } from '@/middleware'

describe('middleware', () => {
  it('answers preflight requests directly', () => {
    const response = middleware(new NextRequest('http://localhost/api/generate-video', { method: 'OPTIONS' }))

    expect(response.status).toBe(204)
    expect(response.headers.get('access-control-allow-origin')).toBe('*')
    expect(response.headers.get('access-control-allow-methods')).toBe(CORS_HEADERS['Access-Control-Allow-Methods'])
  })

  it('adds CORS headers to API responses', () => {
    const response = middleware(new NextRequest('http://localhost/api/videos'))

    expect(response.headers.get('access-control-allow-origin')).toBe('*')
    expect(response.headers.get('access-control-allow-headers')).toBe('Content-Type, Authorization')
  })
})
