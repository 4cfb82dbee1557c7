import { describe, expect, it } from 'vitest';
import { ParseError } from '../../errors';
import { decodeLeadJson, repairLeadOutput, repairLeadRecord } from '../repair';
import { CANNED_REPLY, LEAD_FIELDS, SUMMARY_MAX_CHARS, truncateSummary } from '../types';

describe('repairLeadRecord', () => {
  it('keeps a complete, valid model record', () => {
    const raw = JSON.stringify({
      name: 'Jordan Lee',
      email: 'jordan@example.com',
      phone: '604-555-0199',
      lead_type: 'Seller',
      priority: 'High',
      summary: 'Wants to list a condo.',
      reply: 'Hi Jordan,\n\nThanks for reaching out.',
    });

    expect(repairLeadRecord(raw, 'original body')).toEqual({
      name: 'Jordan Lee',
      email: 'jordan@example.com',
      phone: '604-555-0199',
      lead_type: 'Seller',
      priority: 'High',
      summary: 'Wants to list a condo.',
      reply: 'Hi Jordan,\n\nThanks for reaching out.',
    });
  });

  it('fills absent fields with defaults', () => {
    expect(repairLeadRecord('{"name":"Jordan"}', 'Body text')).toEqual({
      name: 'Jordan',
      email: null,
      phone: null,
      lead_type: 'Other',
      priority: 'Medium',
      summary: 'Body text',
      reply: CANNED_REPLY,
    });
  });

  it('replaces invalid values and matches enums loosely', () => {
    const record = repairLeadRecord(
      JSON.stringify({
        name: '   ',
        email: { address: 'x' },
        phone: 6045550199,
        lead_type: 'Home Evaluation',
        priority: 'urgent',
        summary: 12,
        reply: '',
      }),
      'Body text',
    );

    expect(record.name).toBeNull();
    expect(record.email).toBeNull();
    expect(record.phone).toBe('6045550199');
    expect(record.lead_type).toBe('HomeEvaluation');
    expect(record.priority).toBe('Medium');
    expect(record.summary).toBe('Body text');
    expect(record.reply).toBe(CANNED_REPLY);
  });

  it('accepts lowercase enum values', () => {
    const record = repairLeadRecord('{"lead_type":"vipma","priority":"high"}', 'Body');
    expect(record.lead_type).toBe('VIPMA');
    expect(record.priority).toBe('High');
  });

  it('reads JSON wrapped in a markdown code fence', () => {
    const record = repairLeadRecord('```json\n{"lead_type":"Buyer","reply":"Hello."}\n```', 'Body');
    expect(record.lead_type).toBe('Buyer');
    expect(record.reply).toBe('Hello.');
  });

  it('keeps unparseable output as the reply', () => {
    expect(repairLeadRecord('not json', 'Body text')).toEqual({
      name: null,
      email: null,
      phone: null,
      lead_type: 'Other',
      priority: 'Medium',
      summary: 'Body text',
      reply: 'not json',
    });
  });

  it('treats JSON that is not an object as unparseable', () => {
    expect(repairLeadRecord('[1,2]', 'Body').reply).toBe('[1,2]');
    expect(repairLeadRecord('"just a string"', 'Body').reply).toBe('"just a string"');
  });

  it('truncates the fallback summary to the first 500 characters', () => {
    const body = 'a'.repeat(400) + 'b'.repeat(600);
    const record = repairLeadRecord('not json', body);
    expect(record.summary).toHaveLength(500);
    expect(record.summary).toBe(body.slice(0, 500));
  });

  it('always returns exactly the seven lead fields', () => {
    const outputs = ['not json', '{}', '{"extra":"field","name":"A"}', JSON.stringify({ reply: 'x', lead_type: 'Buyer' })];
    for (const output of outputs) {
      expect(Object.keys(repairLeadRecord(output, 'Body')).sort()).toEqual([...LEAD_FIELDS].sort());
    }
  });
});

describe('truncateSummary', () => {
  it('counts emoji as single characters', () => {
    const summary = truncateSummary('😀'.repeat(1000));
    expect(Array.from(summary)).toHaveLength(SUMMARY_MAX_CHARS);
    expect(summary).toBe('😀'.repeat(500));
  });

  it('never splits a surrogate pair', () => {
    const summary = truncateSummary('a' + '😀'.repeat(600));
    expect(summary).toBe('a' + '😀'.repeat(499));
    expect(summary.endsWith('😀')).toBe(true);
  });
});

describe('repairLeadOutput', () => {
  it('reports the parse error alongside the fallback record', () => {
    const outcome = repairLeadOutput('oops', 'Body');
    expect(outcome.parseError).toBeInstanceOf(ParseError);
    expect(outcome.parseError?.raw).toBe('oops');
    expect(outcome.record.reply).toBe('oops');
  });

  it('has no parse error for valid JSON', () => {
    expect(repairLeadOutput('{}', 'Body').parseError).toBeUndefined();
  });
});

describe('decodeLeadJson', () => {
  it('returns the decoded object', () => {
    const decoded = decodeLeadJson('{"name":"A"}');
    expect(decoded).toEqual({ ok: true, value: { name: 'A' } });
  });

  it('rejects arrays', () => {
    const decoded = decodeLeadJson('[]');
    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.message).toBe('Model output is not a JSON object');
    }
  });
});
