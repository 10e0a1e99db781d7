import { describe, expect, it } from 'vitest';
import { buildDialoguePrompt, exchangeCount } from './gemini.js';

describe('exchangeCount', () => {
  it('allows about eight seconds per exchange', () => {
    expect(exchangeCount(45)).toBe(5);
    expect(exchangeCount(100)).toBe(12);
  });

  it('never asks for fewer than four', () => {
    expect(exchangeCount(10)).toBe(4);
  });
});

describe('buildDialoguePrompt', () => {
  const prompt = buildDialoguePrompt({
    scenario: 'Two chefs argue about pineapple on pizza',
    speakerAName: 'Rosa',
    speakerBName: 'Marco',
    targetDurationSec: 45,
    temperature: 0.7,
    exchanges: 5,
  });

  it('fills every placeholder', () => {
    expect(prompt).toContain('SCENARIO: Two chefs argue about pineapple on pizza');
    expect(prompt).toContain('- Speaker A: Rosa');
    expect(prompt).toContain('- Speaker B: Marco');
    expect(prompt).toContain('Target duration: 45 seconds (approximately 5 exchanges)');
    expect(prompt).not.toMatch(/\{[A-Z_]+\}/);
  });

  it('keeps the JSON example intact', () => {
    expect(prompt).toContain('{"speaker": "A", "text": "dialogue text", "emotion": "friendly"}');
  });
});
