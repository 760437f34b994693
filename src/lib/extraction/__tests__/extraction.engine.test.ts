/**
 * Extraction Engine Tests
 */

import { ExtractionEngine } from '../extraction.engine';
import { IExtractionStrategy } from '../extraction.strategy';
import { HeuristicStrategy } from '../strategies/heuristic.strategy';
import { RESTAURANT_SCHEMA } from '../schemas/restaurant.schema';
import { ExtractionStrategyType, FieldMap } from '../extraction.types';
import { TONYS, tonysContact } from '../../../__tests__/helpers/fixtures';

const mixedPage = `
<html>
<head>
  <title>Tony's</title>
  <script type="application/ld+json">{"@type": "Restaurant", "name": "Tony's Trattoria", "telephone": "617-555-0100"}</script>
</head>
<body>
  <h1>Welcome</h1>
  <p>Email: info@tonys.test</p>
</body>
</html>
`;

function fakeStrategy(
  type: ExtractionStrategyType,
  extract: IExtractionStrategy['extract']
): IExtractionStrategy {
  return { name: `fake ${type}`, type, baseConfidence: 0.5, extract, isAvailable: () => true };
}

describe('ExtractionEngine', () => {
  let engine: ExtractionEngine;

  beforeEach(() => {
    engine = new ExtractionEngine();
  });

  it('should register the three strategies in priority order', () => {
    expect(engine.getStrategies()).toEqual([
      ExtractionStrategyType.STRUCTURED_DATA,
      ExtractionStrategyType.SEMANTIC_MARKUP,
      ExtractionStrategyType.HEURISTIC,
    ]);
  });

  it('should resolve each field with the highest-priority strategy that found it', async () => {
    const result = await engine.extract({ html: mixedPage, url: `${TONYS}/` }, RESTAURANT_SCHEMA);

    expect(result.name).toEqual([
      { value: "Tony's Trattoria", confidence: 0.9, sourceUrl: `${TONYS}/`, strategy: ExtractionStrategyType.STRUCTURED_DATA },
    ]);
    expect(result.phone[0].strategy).toBe(ExtractionStrategyType.STRUCTURED_DATA);
    expect(result.email[0]).toMatchObject({ value: 'info@tonys.test', strategy: ExtractionStrategyType.HEURISTIC });
  });

  it('should extract the contact page phone from its tel link', async () => {
    const result = await engine.extract({ html: tonysContact, url: `${TONYS}/contact` });

    expect(result.phone).toEqual([
      { value: '555-1234', confidence: 0.7, sourceUrl: `${TONYS}/contact`, strategy: ExtractionStrategyType.SEMANTIC_MARKUP },
    ]);
    expect(result.name[0]).toMatchObject({ value: "Tony's", strategy: ExtractionStrategyType.HEURISTIC });
  });

  it('should pass only unresolved fields to later strategies', async () => {
    const seen: string[][] = [];
    const first = fakeStrategy(ExtractionStrategyType.STRUCTURED_DATA, async (context) => ({
      name: [{ value: 'First', confidence: 0.9, sourceUrl: context.url, strategy: ExtractionStrategyType.STRUCTURED_DATA }],
    }));
    const second = fakeStrategy(ExtractionStrategyType.HEURISTIC, async (_context, fields) => {
      seen.push(fields.map((field) => field.name));
      return {};
    });
    engine = new ExtractionEngine([first, second]);

    await engine.extract({ html: '<p>x</p>', url: `${TONYS}/` }, RESTAURANT_SCHEMA);

    expect(seen).toEqual([RESTAURANT_SCHEMA.fields.map((field) => field.name).filter((name) => name !== 'name')]);
  });

  it('should continue past a failing strategy', async () => {
    const failing = fakeStrategy(ExtractionStrategyType.STRUCTURED_DATA, async (): Promise<FieldMap> => {
      throw new Error('boom');
    });
    engine = new ExtractionEngine([failing, new HeuristicStrategy()]);

    const result = await engine.extract({ html: tonysContact, url: `${TONYS}/contact` });

    expect(result.name[0].value).toBe("Tony's");
    expect(console.error).toHaveBeenCalledWith(`Extraction: fake structured_data failed on ${TONYS}/contact: boom`);
  });

  it('should return an empty map for empty content', async () => {
    expect(await engine.extract({ html: '   ', url: `${TONYS}/` })).toEqual({});
  });

  it('should replace a strategy of the same type in place', () => {
    const replacement = fakeStrategy(ExtractionStrategyType.SEMANTIC_MARKUP, async () => ({}));

    engine.registerStrategy(replacement);
    engine.unregisterStrategy(ExtractionStrategyType.HEURISTIC);

    expect(engine.getStrategies()).toEqual([
      ExtractionStrategyType.STRUCTURED_DATA,
      ExtractionStrategyType.SEMANTIC_MARKUP,
    ]);
  });
});
