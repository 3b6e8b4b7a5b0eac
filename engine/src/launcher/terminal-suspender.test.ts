import { describe, it, expect } from '@jest/globals';
import { withSuspendedTerminal } from './terminal-suspender.js';

function recordingSuspender() {
  const events: string[] = [];
  return {
    events,
    suspender: {
      suspend: () => { events.push('suspend'); },
      resume: () => { events.push('resume'); },
    },
  };
}

describe('withSuspendedTerminal', () => {
  it('suspends around the callback and returns its value', () => {
    const { events, suspender } = recordingSuspender();

    const result = withSuspendedTerminal(suspender, () => {
      events.push('run');
      return 7;
    });

    expect(result).toBe(7);
    expect(events).toEqual(['suspend', 'run', 'resume']);
  });

  it('resumes when the callback throws', () => {
    const { events, suspender } = recordingSuspender();

    expect(() => withSuspendedTerminal(suspender, () => {
      throw new Error('ssh crashed');
    })).toThrow('ssh crashed');
    expect(events).toEqual(['suspend', 'resume']);
  });
});
