import { withSentryConfig } from "@sentry/nextjs";
import type { NextConfig } from "next";
import { PHASE_DEVELOPMENT_SERVER, PHASE_PRODUCTION_SERVER } from "next/constants";
import { loadConfig } from "./lib/config";

const nextConfig: NextConfig = {
  // unpdf ships its own pdf.js build; keep it out of the server bundle
  serverExternalPackages: ["unpdf"],

  async headers() {
    return [
      {
        source: "/(.*)",
        headers: [
          { key: "X-Frame-Options", value: "DENY" },
          { key: "X-Content-Type-Options", value: "nosniff" },
          { key: "Referrer-Policy", value: "origin-when-cross-origin" },
        ],
      },
    ];
  },
};

export default function config(phase: string): NextConfig {
  // No API key, no server: fail before the first page is reachable.
  if (phase === PHASE_DEVELOPMENT_SERVER || phase === PHASE_PRODUCTION_SERVER) {
    loadConfig();
  }

  return withSentryConfig(nextConfig, {
    org: process.env.SENTRY_ORG,
    project: process.env.SENTRY_PROJECT,
    silent: true, // Disable Sentry logs during build
    widenClientFileUpload: true,
    disableLogger: true,
    automaticVercelMonitors: false,
  });
}
