import { NextResponse } from 'next/server'
import { getVideoGenerationService } from '@/lib/services'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const records = await getVideoGenerationService().listGenerations()
    return NextResponse.json(records)
  } catch (err) {
    console.error('[Videos] Error:', err)
    return NextResponse.json(
      { error: err instanceof Error ? err.message : 'Internal server error' },
      { status: 500 }
    )
  }
}
