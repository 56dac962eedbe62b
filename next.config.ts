import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  serverExternalPackages: ["pino", "@modelcontextprotocol/sdk"],
};

export default nextConfig;
