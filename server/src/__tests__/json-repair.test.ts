import { describe, it, expect } from 'vitest';
import { repairJSON } from '../lib/json-repair.js';

describe('repairJSON', () => {
  it('parses valid JSON unchanged', () => {
    expect(repairJSON('{"role": "Backend Engineer", "count": 42}')).toEqual({ role: 'Backend Engineer', count: 42 });
  });

  it('strips markdown json fences before parsing', () => {
    expect(repairJSON('```json\n{"answer": true}\n```')).toEqual({ answer: true });
  });

  it('extracts the object from surrounding prose', () => {
    expect(repairJSON('Here is the JSON:\n{"role": "Data Engineer"}\nHope it helps.')).toEqual({ role: 'Data Engineer' });
  });

  it('removes trailing commas in objects and arrays', () => {
    expect(repairJSON('{"role": "Backend Engineer", "technologies": ["Java", "Kafka",],}')).toEqual({
      role: 'Backend Engineer',
      technologies: ['Java', 'Kafka'],
    });
  });

  it('quotes bare keys and single-quoted strings', () => {
    expect(repairJSON("{role: 'Lead', technologies: ['Go']}")).toEqual({ role: 'Lead', technologies: ['Go'] });
  });

  it('closes a completion cut off mid-array', () => {
    expect(repairJSON('{"role": "Backend Engineer", "technologies": ["Java", "Kafka"')).toEqual({
      role: 'Backend Engineer',
      technologies: ['Java', 'Kafka'],
    });
  });

  it('returns undefined for text without JSON', () => {
    expect(repairJSON('this is just plain text with no JSON')).toBeUndefined();
    expect(repairJSON('   ')).toBeUndefined();
  });

  it('skips aggressive repair on very large inputs', () => {
    expect(repairJSON('{' + 'x'.repeat(60_000))).toBeUndefined();
  });
});
