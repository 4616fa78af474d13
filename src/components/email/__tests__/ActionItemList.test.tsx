/**
 * Tests for ActionItemList and EmailList
 */

import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import { ActionItemList } from '../ActionItemList';
import { EmailList } from '../EmailList';
import type { ActionItemWithEmail, EmailSummary } from '@/types/api';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

function actionItem(overrides: Partial<ActionItemWithEmail> = {}): ActionItemWithEmail {
  return {
    id: 'item-1',
    email_id: 'email-1',
    user_id: 'user-1',
    text: 'Send the signed contract',
    deadline: null,
    completed: false,
    completed_at: null,
    created_at: '2026-01-05T09:00:00.000Z',
    email: { subject: 'Contract', sender_name: 'Dana Whitfield' },
    ...overrides,
  };
}

function emailSummary(overrides: Partial<EmailSummary> = {}): EmailSummary {
  return {
    id: 'email-1',
    gmail_id: 'gmail-1',
    subject: 'Quarterly planning',
    sender_name: 'Dana Whitfield',
    sender_email: 'dana@example.com',
    received_at: '2026-01-05T09:00:00.000Z',
    summary: 'Planning session moved to Thursday.',
    category: 'Meeting',
    sentiment_label: 'Neutral',
    sentiment_score: 0,
    priority_score: 4,
    is_important: false,
    is_starred: false,
    needs_followup: false,
    followup_date: null,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ActionItemList
// ═══════════════════════════════════════════════════════════════════════════════

describe('ActionItemList', () => {
  it('shows the empty message when there are no items', () => {
    render(<ActionItemList items={[]} onToggle={vi.fn()} emptyMessage="Nothing left to do." />);

    expect(screen.getByText('Nothing left to do.')).toBeInTheDocument();
  });

  it('calls onToggle with the item id when the checkbox is clicked', () => {
    const onToggle = vi.fn();
    render(<ActionItemList items={[actionItem()]} onToggle={onToggle} />);

    fireEvent.click(screen.getByRole('checkbox', { name: 'Send the signed contract' }));

    expect(onToggle).toHaveBeenCalledWith('item-1');
  });

  it('reflects the completed state on the checkbox', () => {
    render(<ActionItemList items={[actionItem({ completed: true })]} onToggle={vi.fn()} />);

    expect(screen.getByRole('checkbox', { name: 'Send the signed contract' })).toHaveAttribute(
      'aria-checked',
      'true'
    );
  });

  it('highlights a past deadline on an open item', () => {
    render(
      <ActionItemList items={[actionItem({ deadline: '2020-01-15T12:00:00.000Z' })]} onToggle={vi.fn()} />
    );

    expect(screen.getByText('Wed, Jan 15')).toHaveClass('text-red-600');
  });

  it('does not highlight a past deadline once the item is done', () => {
    render(
      <ActionItemList
        items={[actionItem({ deadline: '2020-01-15T12:00:00.000Z', completed: true })]}
        onToggle={vi.fn()}
      />
    );

    expect(screen.getByText('Wed, Jan 15')).not.toHaveClass('text-red-600');
  });

  it('links to the source email only when showSource is set', () => {
    const { rerender } = render(<ActionItemList items={[actionItem()]} onToggle={vi.fn()} />);
    expect(screen.queryByRole('link')).not.toBeInTheDocument();

    rerender(<ActionItemList items={[actionItem()]} onToggle={vi.fn()} showSource />);
    expect(screen.getByRole('link')).toHaveAttribute('href', '/inbox/email-1');
    expect(screen.getByRole('link')).toHaveTextContent('Contract · Dana Whitfield');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// EmailList
// ═══════════════════════════════════════════════════════════════════════════════

describe('EmailList', () => {
  it('shows the error when nothing is loaded', () => {
    render(<EmailList emails={[]} isLoading={false} error={new Error('Failed to fetch emails')} />);

    expect(screen.getByRole('alert')).toHaveTextContent('Failed to fetch emails');
  });

  it('shows the empty message', () => {
    render(<EmailList emails={[]} isLoading={false} error={null} emptyMessage="No starred emails." />);

    expect(screen.getByText('No starred emails.')).toBeInTheDocument();
  });

  it('renders one linked row per email with its badges', () => {
    render(
      <EmailList
        emails={[emailSummary(), emailSummary({ id: 'email-2', subject: '', is_starred: true })]}
        isLoading={false}
        error={null}
      />
    );

    const links = screen.getAllByRole('link');
    expect(links).toHaveLength(2);
    expect(links[0]).toHaveAttribute('href', '/inbox/email-1');
    expect(screen.getByText('Quarterly planning')).toBeInTheDocument();
    expect(screen.getByText('(no subject)')).toBeInTheDocument();
    expect(screen.getByLabelText('Starred')).toBeInTheDocument();
  });
});
