import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "DSS 검수",
  description: "Reconcile a generated summary against its source transcript.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="ko">
      <body className="antialiased">{children}</body>
    </html>
  );
}
