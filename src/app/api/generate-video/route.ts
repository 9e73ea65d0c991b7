import { NextRequest, NextResponse } from 'next/server'
import { ValidationError } from '@/lib/errors'
import { getVideoGenerationService } from '@/lib/services'
import { parseGenerationRequest } from '@/lib/validation'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST(request: NextRequest) {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 })
  }

  try {
    const generationRequest = parseGenerationRequest(body)
    // Pipeline runs on the in-process queue; the response does not wait for it
    const record = await getVideoGenerationService().startGeneration(generationRequest)
    return NextResponse.json(record, { status: 201 })
  } catch (err) {
    if (err instanceof ValidationError) {
      return NextResponse.json({ error: err.message }, { status: 400 })
    }
    console.error('[GenerateVideo] Error:', err)
    return NextResponse.json(
      { error: err instanceof Error ? err.message : 'Internal server error' },
      { status: 500 }
    )
  }
}
