import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Car Damage Estimator",
  description: "Photo-based repair cost estimates from configurable rate tables",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
