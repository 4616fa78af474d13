/**
 * 📑 Sidebar Component
 *
 * Left navigation for the signed-in pages: Inbox, Action items and
 * Insights, with the connected Gmail address and a sign-out button at the
 * bottom.
 *
 * ```tsx
 * <Sidebar gmailEmail={user.gmailEmail} onSignOut={signOut} />
 * ```
 *
 * @module components/layout/Sidebar
 */

'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { BarChart3, CheckSquare, LogOut, Mail } from 'lucide-react';
import { Button } from '@/components/ui';
import { cn } from '@/lib/utils/cn';

// ═══════════════════════════════════════════════════════════════════════════════
// NAVIGATION
// ═══════════════════════════════════════════════════════════════════════════════

const NAV_ITEMS = [
  { href: '/inbox', label: 'Inbox', icon: Mail },
  { href: '/actions', label: 'Action items', icon: CheckSquare },
  { href: '/insights', label: 'Insights', icon: BarChart3 },
] as const;

function isActive(pathname: string, href: string): boolean {
  return pathname === href || pathname.startsWith(`${href}/`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMPONENT
// ═══════════════════════════════════════════════════════════════════════════════

export interface SidebarProps {
  gmailEmail: string | null;
  onSignOut: () => void;
}

export function Sidebar({ gmailEmail, onSignOut }: SidebarProps) {
  const pathname = usePathname();

  return (
    <aside className="flex h-full w-60 shrink-0 flex-col border-r bg-card">
      <div className="px-5 py-4 text-lg font-semibold">Inbox Insights</div>

      <nav aria-label="Main" className="flex-1 space-y-1 px-3">
        {NAV_ITEMS.map(({ href, label, icon: Icon }) => {
          const active = isActive(pathname, href);
          return (
            <Link
              key={href}
              href={href}
              aria-current={active ? 'page' : undefined}
              className={cn(
                'flex items-center gap-3 rounded-md px-3 py-2 text-sm font-medium transition-colors',
                active ? 'bg-primary/10 text-primary' : 'text-muted-foreground hover:bg-accent hover:text-foreground'
              )}
            >
              <Icon className="h-4 w-4" aria-hidden="true" />
              {label}
            </Link>
          );
        })}
      </nav>

      <div className="space-y-2 border-t p-4">
        {gmailEmail && <p className="truncate text-xs text-muted-foreground">{gmailEmail}</p>}
        <Button variant="ghost" size="sm" className="w-full justify-start" onClick={onSignOut}>
          <LogOut aria-hidden="true" />
          Sign out
        </Button>
      </div>
    </aside>
  );
}
