import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  // Native media bindings must stay out of the server bundle
  serverExternalPackages: ['sharp', 'fluent-ffmpeg'],
}

export default nextConfig
