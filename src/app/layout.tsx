/**
 * 🏠 Root Layout
 *
 * Base HTML structure and metadata for every page. Authentication lives in
 * the `(auth)` route group layout; this one stays a server component.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STRUCTURE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * html
 * └── body
 *     ├── /                 (Landing page with Gmail sign-in)
 *     └── (auth)/*          (Sidebar layout: inbox, actions, insights)
 *
 * @module app/layout
 */

import type { ReactNode } from 'react';
import type { Metadata, Viewport } from 'next';
import './globals.css';

// ═══════════════════════════════════════════════════════════════════════════════
// ROUTE SEGMENT CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Session state is read per request, so nothing is prerendered.
 */
export const dynamic = 'force-dynamic';

// ═══════════════════════════════════════════════════════════════════════════════
// METADATA
// ═══════════════════════════════════════════════════════════════════════════════

export const metadata: Metadata = {
  title: {
    default: 'Inbox Insights',
    template: '%s | Inbox Insights',
  },
  description:
    'Read your Gmail inbox with summaries, categories, sentiment, priority, action items and contacts extracted from every message.',
  keywords: ['email', 'gmail', 'inbox', 'nlp', 'action items', 'contacts'],
  applicationName: 'Inbox Insights',
};

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: [
    { media: '(prefers-color-scheme: light)', color: 'white' },
    { media: '(prefers-color-scheme: dark)', color: '#0a0a0a' },
  ],
};

// ═══════════════════════════════════════════════════════════════════════════════
// LAYOUT COMPONENT
// ═══════════════════════════════════════════════════════════════════════════════

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="min-h-screen bg-background font-sans text-foreground antialiased">{children}</body>
    </html>
  );
}
