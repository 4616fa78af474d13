import { describe, it, expect } from 'vitest';
import { detectFollowup } from '../followup';

const MONDAY = new Date(2026, 0, 5, 9, 0);
const FRIDAY = new Date(2026, 0, 9, 9, 0);

describe('detectFollowup', () => {
  it('defaults to the next business day', () => {
    expect(detectFollowup('Quarterly plan', 'Let me know what you think.', MONDAY)).toEqual({
      needsFollowup: true,
      followupDate: '2026-01-06',
    });
    expect(detectFollowup('Quarterly plan', 'Let me know what you think.', FRIDAY)).toEqual({
      needsFollowup: true,
      followupDate: '2026-01-12',
    });
  });

  it('uses an explicit deadline from the body', () => {
    expect(detectFollowup('Contract', 'Please get back to me by Thursday.', MONDAY)).toEqual({
      needsFollowup: true,
      followupDate: '2026-01-08',
    });
  });

  it('looks at the subject too', () => {
    expect(detectFollowup('Follow-up on our chat', 'See attached.', MONDAY).needsFollowup).toBe(true);
  });

  it('needs a request phrase', () => {
    expect(detectFollowup('Newsletter', 'Here is this week in review.', MONDAY)).toEqual({
      needsFollowup: false,
      followupDate: null,
    });
  });
});
