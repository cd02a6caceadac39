import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Genkit and its OpenTelemetry instrumentation are loaded from node_modules at run time.
  serverExternalPackages: ['genkit', '@genkit-ai/googleai'],
  eslint: {
    ignoreDuringBuilds: true,
  },
};

export default nextConfig;
