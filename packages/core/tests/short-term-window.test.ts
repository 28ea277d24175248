import { describe, it, expect } from 'vitest';
import { ValidationError } from '@insights/shared';
import { appendTurn, createSession, setOlderSummary } from '../src/short-term-window.js';

describe('appendTurn', () => {
  it('keeps exactly the newest six turns in original order', () => {
    let session = createSession(1);
    session = appendTurn(session, 'q1', 'a1');
    session = appendTurn(session, 'q2', 'a2');
    expect(session.shortTermMemory.recentTurns).toHaveLength(4);

    session = appendTurn(session, 'q3', 'a3');
    session = appendTurn(session, 'q4', 'a4');

    expect(session.shortTermMemory.recentTurns).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
      { role: 'assistant', content: 'a3' },
      { role: 'user', content: 'q4' },
      { role: 'assistant', content: 'a4' },
    ]);
  });

  it('does not fold evicted turns into the summary', () => {
    let session = createSession(null);
    for (let i = 0; i < 5; i++) session = appendTurn(session, `q${i}`, `a${i}`);
    expect(session.shortTermMemory.olderSummary).toBe('');
  });

  it('leaves the input session untouched', () => {
    const original = appendTurn(createSession(1), 'q1', 'a1');
    const snapshot = structuredClone(original);

    appendTurn(original, 'q2', 'a2');
    expect(original).toEqual(snapshot);
  });

  it('honours a custom cap, including zero', () => {
    const session = appendTurn(appendTurn(createSession(1), 'q1', 'a1'), 'q2', 'a2', 3);
    expect(session.shortTermMemory.recentTurns.map(t => t.content)).toEqual(['a1', 'q2', 'a2']);
    expect(appendTurn(createSession(1), 'q', 'a', 0).shortTermMemory.recentTurns).toEqual([]);
  });

  it('rejects a negative or fractional cap', () => {
    expect(() => appendTurn(createSession(1), 'q', 'a', -1)).toThrow(ValidationError);
    expect(() => appendTurn(createSession(1), 'q', 'a', 2.5)).toThrow(ValidationError);
  });

  it('preserves userId, metrics and summary', () => {
    const start = setOlderSummary({ ...createSession(7), metrics: { pass_rate: 0.8 } }, 'earlier');
    const next = appendTurn(start, 'q', 'a');
    expect(next.userId).toBe(7);
    expect(next.metrics).toEqual({ pass_rate: 0.8 });
    expect(next.shortTermMemory.olderSummary).toBe('earlier');
  });
});

describe('setOlderSummary', () => {
  it('returns a new session with the summary set', () => {
    const session = createSession(null);
    const next = setOlderSummary(session, 'we compared suites');
    expect(next.shortTermMemory.olderSummary).toBe('we compared suites');
    expect(session.shortTermMemory.olderSummary).toBe('');
  });
});
