import { ExperimentRouter, parseWeights } from '../../src/experiment/experiment-router';
import { ConfigurationError } from '../../src/gateway/errors';

const AI_VS_RULES = {
  name: 'ai_vs_rules',
  variants: [
    { name: 'ai', weight: 50 },
    { name: 'rules', weight: 50 },
  ],
};

function share(router: ExperimentRouter, experiment: string, variant: string, subjects: number): number {
  let hits = 0;
  for (let i = 0; i < subjects; i++) {
    if (router.assign(experiment, `user-${i}`) === variant) hits++;
  }
  return hits / subjects;
}

describe('ExperimentRouter', () => {
  describe('assign', () => {
    it('should give the same subject the same variant every time', () => {
      const router = new ExperimentRouter([AI_VS_RULES]);
      const first = router.assign('ai_vs_rules', 'user-42');
      for (let i = 0; i < 20; i++) {
        expect(router.assign('ai_vs_rules', 'user-42')).toBe(first);
      }
    });

    it('should be stable across router instances', () => {
      const a = new ExperimentRouter([AI_VS_RULES]);
      const b = new ExperimentRouter([AI_VS_RULES]);
      for (let i = 0; i < 50; i++) {
        expect(b.assign('ai_vs_rules', `user-${i}`)).toBe(a.assign('ai_vs_rules', `user-${i}`));
      }
    });

    it('should split an even experiment roughly in half', () => {
      const router = new ExperimentRouter([AI_VS_RULES]);
      expect(Math.abs(share(router, 'ai_vs_rules', 'ai', 5000) - 0.5)).toBeLessThan(0.05);
    });

    it('should follow uneven weights', () => {
      const router = new ExperimentRouter([
        { name: 'prompt_style', variants: [{ name: 'concise', weight: 70 }, { name: 'exploratory', weight: 30 }] },
      ]);
      expect(Math.abs(share(router, 'prompt_style', 'concise', 5000) - 0.7)).toBeLessThan(0.05);
    });

    it('should never pick a zero-weight variant', () => {
      const router = new ExperimentRouter([
        { name: 'all_ai', variants: [{ name: 'ai', weight: 100 }, { name: 'rules', weight: 0 }] },
      ]);
      expect(share(router, 'all_ai', 'rules', 500)).toBe(0);
    });

    it('should keep experiment and subject apart when names contain a colon', () => {
      const even = [
        { name: 'x', weight: 1 },
        { name: 'y', weight: 1 },
      ];
      const router = new ExperimentRouter([
        { name: 'a', variants: even },
        { name: 'a:b', variants: even },
      ]);
      let differing = 0;
      for (let i = 0; i < 200; i++) {
        if (router.assign('a', `b:c${i}`) !== router.assign('a:b', `c${i}`)) differing++;
      }
      expect(differing).toBeGreaterThan(0);
    });

    it('should throw for an unknown experiment', () => {
      const router = new ExperimentRouter([AI_VS_RULES]);
      expect(() => router.assign('missing', 'user-1')).toThrow(ConfigurationError);
    });

    it('should describe an assignment', () => {
      const router = new ExperimentRouter([AI_VS_RULES]);
      const variant = router.assign('ai_vs_rules', 'user-7');
      expect(router.assignment('ai_vs_rules', 'user-7')).toEqual({
        experiment: 'ai_vs_rules',
        subjectId: 'user-7',
        variant,
      });
    });
  });

  describe('register', () => {
    it('should reject weights that sum to zero', () => {
      expect(
        () => new ExperimentRouter([{ name: 'broken', variants: [{ name: 'a', weight: 0 }, { name: 'b', weight: 0 }] }]),
      ).toThrow('weights sum to zero');
    });

    it('should reject negative and fractional weights', () => {
      expect(() => new ExperimentRouter([{ name: 'neg', variants: [{ name: 'a', weight: -1 }] }])).toThrow(
        ConfigurationError,
      );
      expect(() => new ExperimentRouter([{ name: 'frac', variants: [{ name: 'a', weight: 0.5 }] }])).toThrow(
        ConfigurationError,
      );
    });

    it('should reject duplicate experiments and repeated variants', () => {
      expect(() => new ExperimentRouter([AI_VS_RULES, AI_VS_RULES])).toThrow('Duplicate experiment: ai_vs_rules');
      expect(
        () => new ExperimentRouter([{ name: 'dup', variants: [{ name: 'a', weight: 1 }, { name: 'a', weight: 1 }] }]),
      ).toThrow('repeats variant "a"');
    });

    it('should reject an experiment without variants', () => {
      expect(() => new ExperimentRouter([{ name: 'empty', variants: [] }])).toThrow('has no variants');
    });

    it('should list registered experiments', () => {
      const router = new ExperimentRouter([AI_VS_RULES]);
      expect(router.has('ai_vs_rules')).toBe(true);
      expect(router.list()).toEqual([AI_VS_RULES]);
    });
  });
});

describe('parseWeights', () => {
  it('should parse a weight list', () => {
    expect(parseWeights('ai:70, rules:30')).toEqual([
      { name: 'ai', weight: 70 },
      { name: 'rules', weight: 30 },
    ]);
  });

  it.each(['', 'ai', 'ai:', 'ai:fifty', 'ai:-1', 'ai:1.5', ':50'])('should reject %p', (weights) => {
    expect(() => parseWeights(weights)).toThrow(ConfigurationError);
  });
});
