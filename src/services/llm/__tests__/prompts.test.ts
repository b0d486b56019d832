import { describe, expect, it } from 'vitest';
import { emptyVisionResult } from '../../vision/VisionService';
import { buildTaggingPrompt, visionContext } from '../prompts';

describe('prompts', () => {
  it('renders vision hints, de-duplicated, skipping empty categories', () => {
    const context = visionContext(
      {
        ...emptyVisionResult(),
        labels: [
          { description: 'Sky', score: 0.9 },
          { description: 'Sky', score: 0.8 },
          { description: 'Sea', score: 0.7 },
        ],
        colors: [{ hex: '#ff8000', score: 0.5, pixelFraction: 0.3 }],
      },
      'en'
    );

    expect(context).toBe('- Detected labels: Sky, Sea\n- Dominant colours: #ff8000');
  });

  it('omits the hints section when vision found nothing', () => {
    const prompt = buildTaggingPrompt(emptyVisionResult(), 'en');
    expect(prompt).not.toContain('Hints from automatic analysis');
    expect(prompt).toContain('"technical_characteristics"');
    expect(prompt.endsWith('Return nothing but the JSON.')).toBe(true);
  });
});
