import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // the canvas binding is a native module; keep it out of the server bundle
  serverExternalPackages: ["@napi-rs/canvas"],
  experimental: {
    // core modules live one level up, in ../signature
    externalDir: true,
  },
};

export default nextConfig;
