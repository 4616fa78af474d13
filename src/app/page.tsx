/**
 * 🏠 Landing Page
 *
 * Entry point for visitors without a session: a short description and the
 * Gmail sign-in button.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * BEHAVIOR
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - No session: landing page with sign-in
 * - Session with a usable Gmail account: redirect to /inbox
 * - `?error=<code>` from the OAuth callback: message above the button
 *
 * @module app/page
 */

'use client';

import * as React from 'react';
import { useRouter, useSearchParams } from 'next/navigation';
import { CheckSquare, Mail, Smile, Users } from 'lucide-react';
import { Button, Card, CardContent, Skeleton } from '@/components/ui';
import { useAuth } from '@/hooks';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('LandingPage');

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

interface Feature {
  icon: React.ReactNode;
  title: string;
  description: string;
}

const FEATURES: Feature[] = [
  {
    icon: <Mail className="h-6 w-6 text-primary" />,
    title: 'Summaries and categories',
    description: 'Every email gets a short summary and one of eight categories, from Meeting to Promotional.',
  },
  {
    icon: <Smile className="h-6 w-6 text-primary" />,
    title: 'Sentiment and priority',
    description: 'Urgent and negative messages stand out with a sentiment label and a 0 to 10 priority score.',
  },
  {
    icon: <CheckSquare className="h-6 w-6 text-primary" />,
    title: 'Action items',
    description: 'Requests and deadlines are pulled out into a checklist you can tick off.',
  },
  {
    icon: <Users className="h-6 w-6 text-primary" />,
    title: 'Contacts',
    description: 'Names, phone numbers and companies are read from signatures.',
  },
];

/** Messages for the codes the OAuth callback redirects with */
const SIGN_IN_ERRORS: Record<string, string> = {
  access_denied: 'Gmail access was declined. Sign in again and allow read access.',
  missing_code: 'Sign in was cancelled. Please try again.',
  exchange_failed: 'Sign in could not be completed. Please try again.',
  missing_gmail_token: 'Google did not return a Gmail token. Please try again.',
  token_storage_failed: 'Your Gmail connection could not be saved. Please try again.',
};

// ═══════════════════════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════════════════════

function FeatureCard({ icon, title, description }: Feature) {
  return (
    <Card>
      <CardContent className="pt-6">
        <div className="mb-3">{icon}</div>
        <h3 className="mb-1 font-semibold">{title}</h3>
        <p className="text-sm text-muted-foreground">{description}</p>
      </CardContent>
    </Card>
  );
}

function Landing() {
  const router = useRouter();
  const searchParams = useSearchParams();
  const { user, isLoading, error, signIn } = useAuth();
  const [isSigningIn, setIsSigningIn] = React.useState(false);

  const errorCode = searchParams.get('error');
  const callbackError = errorCode ? (SIGN_IN_ERRORS[errorCode] ?? 'Sign in failed. Please try again.') : null;

  React.useEffect(() => {
    if (errorCode) {
      logger.warn('OAuth error on landing page', { error: errorCode });
    }
  }, [errorCode]);

  React.useEffect(() => {
    if (!isLoading && user?.isAuthenticated) {
      router.replace('/inbox');
    }
  }, [isLoading, user, router]);

  const handleSignIn = async () => {
    setIsSigningIn(true);
    await signIn();
    // signIn leaves the page on success
    setIsSigningIn(false);
  };

  if (isLoading || user?.isAuthenticated) {
    return (
      <div className="flex min-h-screen items-center justify-center" role="status" aria-label="Loading">
        <Skeleton className="h-8 w-48" />
      </div>
    );
  }

  const message = callbackError ?? error?.message ?? null;

  return (
    <main className="container flex min-h-screen flex-col items-center justify-center py-16">
      <div className="mx-auto max-w-2xl text-center">
        <h1 className="text-4xl font-bold tracking-tight sm:text-5xl">Inbox Insights</h1>
        <p className="mt-4 text-lg text-muted-foreground">
          Connect Gmail to see your recent, important and starred emails with summaries, sentiment, priority
          and the action items hidden inside them.
        </p>

        {message && (
          <p role="alert" className="mt-6 rounded-md border border-red-200 bg-red-50 px-4 py-3 text-sm text-red-700">
            {message}
          </p>
        )}

        <Button
          size="lg"
          className="mt-8"
          onClick={() => void handleSignIn()}
          isLoading={isSigningIn}
          loadingText="Connecting..."
        >
          Sign in with Gmail
        </Button>
        <p className="mt-3 text-xs text-muted-foreground">Read-only access. Nothing is sent or deleted.</p>
      </div>

      <div className="mt-16 grid w-full max-w-4xl gap-4 sm:grid-cols-2">
        {FEATURES.map((feature) => (
          <FeatureCard key={feature.title} {...feature} />
        ))}
      </div>
    </main>
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE
// ═══════════════════════════════════════════════════════════════════════════════

/** useSearchParams needs a Suspense boundary in the App Router */
export default function LandingPage() {
  return (
    <React.Suspense fallback={null}>
      <Landing />
    </React.Suspense>
  );
}
