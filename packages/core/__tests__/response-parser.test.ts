import { describe, it, expect } from 'vitest';
import {
  extractJsonRecord,
  parseCriterionResponse,
  parseGeneralAssessmentResponse,
  UNPARSEABLE_RESPONSE_GAP,
} from '../src/ai/response-parser.js';

// ── extractJsonRecord ───────────────────────────────────────────────────────

describe('extractJsonRecord', () => {
  it('parses a response that is a bare JSON object', () => {
    expect(extractJsonRecord('  {"a": 1}  ')).toEqual({ a: 1 });
  });

  it('parses the first fenced code block', () => {
    const raw = 'Here is my analysis:\n```json\n{"a": 2}\n```\nThanks.';
    expect(extractJsonRecord(raw)).toEqual({ a: 2 });
  });

  it('falls back to the outermost brace span', () => {
    expect(extractJsonRecord('Sure! {"a": {"b": 3}} Hope that helps.')).toEqual({ a: { b: 3 } });
  });

  it('rejects non-object JSON and plain text', () => {
    expect(extractJsonRecord('[1, 2]')).toBeUndefined();
    expect(extractJsonRecord('no json here')).toBeUndefined();
  });
});

// ── parseCriterionResponse ──────────────────────────────────────────────────

describe('parseCriterionResponse', () => {
  it('decodes a well-formed answer', () => {
    const raw = JSON.stringify({
      fulfilled: true,
      confidence: 0.9,
      evidence: ['adds retry loop'],
      gaps: [],
      reasoning: 'Covered by the new handler',
    });

    expect(parseCriterionResponse(raw)).toEqual({
      stage: 'structured',
      value: {
        fulfilled: true,
        confidence: 0.9,
        evidence: ['adds retry loop'],
        gaps: [],
        reasoning: 'Covered by the new handler',
      },
    });
  });

  it('fills defaults for missing and null fields', () => {
    const parsed = parseCriterionResponse('{"fulfilled": true, "confidence": null, "evidence": null}');
    expect(parsed.value).toEqual({
      fulfilled: true,
      confidence: 0.5,
      evidence: [],
      gaps: [],
      reasoning: '',
    });
  });

  it('accepts a lone string where a list is expected', () => {
    const parsed = parseCriterionResponse('{"fulfilled": false, "gaps": "missing validation"}');
    expect(parsed.value.gaps).toEqual(['missing validation']);
  });

  it('clamps confidence to the unit interval', () => {
    expect(parseCriterionResponse('{"fulfilled": true, "confidence": 1.7}').value.confidence).toBe(1);
    expect(parseCriterionResponse('{"fulfilled": true, "confidence": -0.2}').value.confidence).toBe(0);
  });

  it('decodes an answer wrapped in a fence with surrounding prose', () => {
    const raw = 'Analysis:\n```json\n{"fulfilled": false, "confidence": 0.8, "gaps": ["no tests"]}\n```';
    const parsed = parseCriterionResponse(raw);
    expect(parsed.stage).toBe('structured');
    expect(parsed.value.gaps).toEqual(['no tests']);
  });

  it('falls back to the heuristic reading for free text', () => {
    const raw = 'The criterion is fulfilled by the new handler.';
    expect(parseCriterionResponse(raw)).toEqual({
      stage: 'heuristic',
      value: {
        fulfilled: true,
        confidence: 0.5,
        evidence: [],
        gaps: [UNPARSEABLE_RESPONSE_GAP],
        reasoning: raw,
      },
    });
  });

  it('reads free text without the keyword as unfulfilled', () => {
    expect(parseCriterionResponse('Not sure.').value.fulfilled).toBe(false);
  });

  it('keeps an explicit unmet verdict when another field has the wrong type', () => {
    const parsed = parseCriterionResponse('{"fulfilled": false, "confidence": "0.9", "gaps": ["no lockout"]}');
    expect(parsed).toEqual({
      stage: 'structured',
      value: {
        fulfilled: false,
        confidence: 0.9,
        evidence: [],
        gaps: ['no lockout'],
        reasoning: '',
      },
    });
  });

  it('defaults only the malformed fields of a record', () => {
    const parsed = parseCriterionResponse(
      '{"fulfilled": "true", "confidence": "high", "evidence": [1, 2], "gaps": ["x"], "reasoning": 42}',
    );
    expect(parsed).toEqual({
      stage: 'structured',
      value: { fulfilled: true, confidence: 0.5, evidence: [], gaps: ['x'], reasoning: '' },
    });
  });

  it('reads the fulfilled field of a truncated record as written', () => {
    const parsed = parseCriterionResponse('{"fulfilled": false, "confidence": 0.9, "gaps": ["no lock');
    expect(parsed.stage).toBe('heuristic');
    expect(parsed.value.fulfilled).toBe(false);
  });

  it('keeps a 200-character excerpt of long unparseable answers', () => {
    const parsed = parseCriterionResponse('x'.repeat(250));
    expect(parsed.value.reasoning).toBe(`${'x'.repeat(200)}...`);
  });
});

// ── parseGeneralAssessmentResponse ──────────────────────────────────────────

describe('parseGeneralAssessmentResponse', () => {
  it('maps the response keys onto the assessment', () => {
    const raw = JSON.stringify({
      security_issues: ['SQL built by string concatenation'],
      performance_concerns: [],
      maintainability_issues: 'long function',
      positive_aspects: ['clear names'],
      overall_assessment: 'Reasonable change',
    });

    expect(parseGeneralAssessmentResponse(raw)).toEqual({
      stage: 'structured',
      value: {
        securityIssues: ['SQL built by string concatenation'],
        performanceConcerns: [],
        maintainabilityIssues: ['long function'],
        positiveAspects: ['clear names'],
        overallAssessment: 'Reasonable change',
      },
    });
  });

  it('keeps the valid lists when one field is malformed', () => {
    const raw = JSON.stringify({
      security_issues: ['token logged'],
      performance_concerns: { note: 'n/a' },
      overall_assessment: 'Needs work',
    });

    expect(parseGeneralAssessmentResponse(raw)).toEqual({
      stage: 'structured',
      value: {
        securityIssues: ['token logged'],
        performanceConcerns: [],
        maintainabilityIssues: [],
        positiveAspects: [],
        overallAssessment: 'Needs work',
      },
    });
  });

  it('keeps free text as the overall assessment', () => {
    expect(parseGeneralAssessmentResponse('Looks fine overall.')).toEqual({
      stage: 'heuristic',
      value: {
        securityIssues: [],
        performanceConcerns: [],
        maintainabilityIssues: [],
        positiveAspects: [],
        overallAssessment: 'Looks fine overall.',
      },
    });
  });
});
