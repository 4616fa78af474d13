/**
 * 🔐 useAuth Hook
 *
 * The signed-in user and their Gmail connection, with sign-in and sign-out.
 *
 * ```tsx
 * const { user, isLoading, signIn, signOut } = useAuth();
 *
 * if (!user?.isAuthenticated) return <Button onClick={signIn}>Sign in with Gmail</Button>;
 * ```
 *
 * @module hooks/useAuth
 */

'use client';

import * as React from 'react';
import { apiClient } from '@/lib/api/client';
import { createLogger } from '@/lib/utils/logger';
import type { AuthUser } from '@/types/api';

const logger = createLogger('useAuth');

export interface UseAuthReturn {
  /** null when there is no session */
  user: AuthUser | null;
  isLoading: boolean;
  error: Error | null;
  /** Sends the browser to Google's consent screen */
  signIn: () => Promise<void>;
  signOut: () => Promise<void>;
  refetch: () => Promise<void>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function useAuth(): UseAuthReturn {
  const [user, setUser] = React.useState<AuthUser | null>(null);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<Error | null>(null);

  const fetchUser = React.useCallback(async () => {
    setIsLoading(true);
    setError(null);

    try {
      setUser(await apiClient.getUser());
    } catch (err) {
      logger.error('Failed to load user', { error: toError(err).message });
      setError(toError(err));
    } finally {
      setIsLoading(false);
    }
  }, []);

  React.useEffect(() => {
    void fetchUser();
  }, [fetchUser]);

  const signIn = React.useCallback(async () => {
    setError(null);
    try {
      const url = await apiClient.getLoginUrl();
      window.location.assign(url);
    } catch (err) {
      logger.error('Failed to start sign-in', { error: toError(err).message });
      setError(toError(err));
    }
  }, []);

  const signOut = React.useCallback(async () => {
    setError(null);
    try {
      await apiClient.logout();
      setUser(null);
    } catch (err) {
      logger.error('Failed to sign out', { error: toError(err).message });
      setError(toError(err));
    }
  }, []);

  return { user, isLoading, error, signIn, signOut, refetch: fetchUser };
}
