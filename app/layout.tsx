import type { Metadata } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: 'Bikeroom Sales Dashboard',
  description: 'Sales analysis on generated bicycle sales data',
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
