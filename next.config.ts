import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: ["@nivo/bar", "@nivo/line", "@nivo/pie", "@nivo/heatmap", "@nivo/geo"],

  async headers() {
    return [
      {
        source: "/api/:path*",
        headers: [
          { key: "X-Content-Type-Options", value: "nosniff" },
          { key: "X-Frame-Options", value: "DENY" },
        ],
      },
    ];
  },
};

export default nextConfig;
