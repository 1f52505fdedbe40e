import { describe, expect, it } from 'vitest';

import { isEmptyFeedback, isTruthy, parseFeedback, stripCodeFence, toText } from './feedback.js';

describe('parseFeedback', () => {
  it('recovers a fenced payload', () => {
    const raw = '```json\n{"call_outcome":"closed","call_score":{"overall_score":8}}\n```';
    expect(parseFeedback(raw)).toEqual({ call_outcome: 'closed', call_score: { overall_score: 8 } });
  });

  it('recovers the exact object from unfenced JSON', () => {
    const payload = {
      call_outcome: 'lost',
      summary: 'Customer wanted a lower price',
      what_went_well: ['Friendly greeting'],
      spin_analysis: { situation_questions_used: true, implication_questions_used: false },
      custom_note: { reviewer: 'qa' },
    };
    expect(parseFeedback(JSON.stringify(payload))).toEqual(payload);
  });

  it('accepts a bare ``` fence', () => {
    expect(parseFeedback('```\n{"summary":"ok"}\n```')).toEqual({ summary: 'ok' });
  });

  it.each([
    ['not json at all'],
    ['{"call_outcome": '],
    ['[1, 2, 3]'],
    ['"just a string"'],
    ['42'],
    [''],
    ['   '],
    ['nan'],
    ['None'],
    ['N/A'],
  ])('returns an empty payload for %j', (raw) => {
    expect(parseFeedback(raw)).toEqual({});
  });

  it('returns an empty payload for non-string input', () => {
    expect(parseFeedback(undefined)).toEqual({});
    expect(parseFeedback(null)).toEqual({});
    expect(parseFeedback(12)).toEqual({});
  });

  it('drops a field of the wrong type and keeps the rest', () => {
    const parsed = parseFeedback('{"call_outcome":"closed","call_score":"eight"}');
    expect(parsed.call_outcome).toBe('closed');
    expect(parsed.call_score).toBeUndefined();
  });

  it('keeps flag values as written', () => {
    const parsed = parseFeedback('{"spin_analysis":{"situation_questions_used":"yes","problem_questions_used":1}}');
    expect(parsed.spin_analysis).toEqual({ situation_questions_used: 'yes', problem_questions_used: 1 });
  });

  it('carries numeric timestamps forward as text', () => {
    const parsed = parseFeedback('{"active_listening_failures":[{"timestamp":125}],"exceptional_moments":[{"timestamp":true}]}');
    expect(parsed.active_listening_failures).toEqual([{ timestamp: '125' }]);
    expect(parsed.exceptional_moments).toEqual([{ timestamp: undefined }]);
  });

  it('discards non-object entries in event lists', () => {
    const parsed = parseFeedback('{"active_listening_failures":["oops",{"timestamp":"01:10"}]}');
    expect(parsed.active_listening_failures).toEqual([{ timestamp: '01:10' }]);
  });
});

describe('stripCodeFence', () => {
  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  {"a":1}  ')).toBe('{"a":1}');
  });

  it('strips a fence without a closing marker', () => {
    expect(stripCodeFence('```json {"a":1}')).toBe('{"a":1}');
  });
});

describe('isTruthy', () => {
  it('reads flags by truthiness', () => {
    expect([true, 'yes', 'true', 1, ['x'], { a: 1 }].map(isTruthy)).toEqual([true, true, true, true, true, true]);
    expect([false, '', 0, null, undefined, [], {}].map(isTruthy)).toEqual([false, false, false, false, false, false, false]);
  });
});

describe('isEmptyFeedback', () => {
  it('is true only for the empty payload', () => {
    expect(isEmptyFeedback({})).toBe(true);
    expect(isEmptyFeedback({ summary: '' })).toBe(false);
  });
});

describe('toText', () => {
  it('reads text from objects and stringifies the rest', () => {
    expect(toText('Good rapport')).toBe('Good rapport');
    expect(toText({ text: 'Clear pricing' })).toBe('Clear pricing');
    expect(toText({ label: 'x' })).toBe('{"label":"x"}');
    expect(toText(3)).toBe('3');
    expect(toText(null)).toBe('');
  });
});
