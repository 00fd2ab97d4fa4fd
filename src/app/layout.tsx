import type { Metadata } from "next";
import { Geist, Geist_Mono } from "next/font/google";
import "./globals.css";

const geistSans = Geist({
  variable: "--font-geist-sans",
  subsets: ["latin"],
});

const geistMono = Geist_Mono({
  variable: "--font-geist-mono",
  subsets: ["latin"],
});

export const metadata: Metadata = {
  title: "CO2 Emissions Dashboard | Tracking Global Carbon Footprints",
  description:
    "Interactive dashboard of CO2 emissions by country, sector and year: trends, rankings, growth rates and an animated world map.",
  openGraph: {
    title: "CO2 Emissions Dashboard",
    description: "Tracking Global Carbon Footprints",
    siteName: "Carbon Footprint Dashboard",
  },
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" className="dark">
      <body
        className={`${geistSans.variable} ${geistMono.variable} antialiased bg-zinc-950 text-white`}
      >
        {children}
      </body>
    </html>
  );
}
