import type { Metadata } from "next";
import "./globals.css";
import { Toaster } from "sonner";

export const metadata: Metadata = {
  title: "AI Career Copilot",
  description: "Compare your resume against a job description and get a tailored report.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased bg-gradient-to-br from-blue-50 to-purple-50">
        {children}
        <Toaster
          position="top-right"
          richColors
          closeButton
          duration={5000}
          expand={true}
          theme="light"
        />
      </body>
    </html>
  );
}
