import { describe, it, expect } from 'vitest';
import {
  parseArbitrationResponse,
  parseClarificationResponse,
  stripJsonWrapping,
} from './llm-response.parser.js';
import { LlmResponseFormatError } from './router.errors.js';

describe('stripJsonWrapping', () => {
  it('removes markdown code fences', () => {
    expect(stripJsonWrapping('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('drops prose around the object', () => {
    expect(stripJsonWrapping('Sure! Here it is: {"a": 1} Hope that helps.')).toBe('{"a": 1}');
  });

  it('leaves text without an object alone', () => {
    expect(stripJsonWrapping('  no json here ')).toBe('no json here');
  });
});

describe('parseArbitrationResponse', () => {
  it('parses a fenced response', () => {
    const parsed = parseArbitrationResponse(
      '```json\n{"chosen_agent": "libguide", "confidence": 0.82, "reasoning": "Asks for a course guide."}\n```'
    );

    expect(parsed).toEqual({ chosen_agent: 'libguide', confidence: 0.82, reasoning: 'Asks for a course guide.' });
  });

  it('defaults a missing reasoning to an empty string', () => {
    expect(parseArbitrationResponse('{"chosen_agent": "google_site", "confidence": 0.6}').reasoning).toBe('');
  });

  it('rejects a confidence outside 0-1', () => {
    expect(() => parseArbitrationResponse('{"chosen_agent": "libguide", "confidence": 1.5}')).toThrow(
      'Arbitration response has invalid fields: confidence'
    );
  });

  it('rejects a confidence given as a string', () => {
    expect(() => parseArbitrationResponse('{"chosen_agent": "libguide", "confidence": "0.9"}')).toThrow(
      LlmResponseFormatError
    );
  });

  it('rejects invalid JSON and keeps the raw content', () => {
    try {
      parseArbitrationResponse('libguide, probably');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LlmResponseFormatError);
      if (error instanceof LlmResponseFormatError) {
        expect(error.message).toBe('Arbitration response is not valid JSON');
        expect(error.rawContent).toBe('libguide, probably');
        expect(error.code).toBe('LLM_RESPONSE_FORMAT');
      }
    }
  });
});

describe('parseClarificationResponse', () => {
  it('parses question and options', () => {
    const parsed = parseClarificationResponse(
      '{"question": "Do you want to reserve a room or check hours?", "options": [{"label": "Reserve a room", "value": "libcal_hours"}]}'
    );

    expect(parsed.question).toBe('Do you want to reserve a room or check hours?');
    expect(parsed.options).toEqual([{ label: 'Reserve a room', value: 'libcal_hours' }]);
  });

  it('rejects an empty option list', () => {
    expect(() => parseClarificationResponse('{"question": "Which one?", "options": []}')).toThrow(
      'Clarification response has invalid fields: options'
    );
  });
});
