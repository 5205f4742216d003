import { load } from 'cheerio';
import type { Strategy } from '@autofields/shared';
import { resolve } from './resolver';
import * as strategies from './strategies';
import { classifiedAs } from './disambiguate';

const $ = load(`
  <h1>Gol 1.0</h1>
  <h2 class="blank">   </h2>
  <div class="tags"><a>VOLKSWAGEN</a><a>2019</a></div>
`);

describe('resolve', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should stop at the first strategy that yields a candidate', () => {
    const spy = jest.spyOn(strategies, 'evaluateStrategy');
    const chain: Strategy[] = [
      { kind: 'css', selector: 'h1' },
      { kind: 'css', selector: 'h2' },
      { kind: 'regex', pattern: 'Gol' },
    ];

    const candidate = resolve($, chain);

    expect(candidate).toEqual({ text: 'Gol 1.0', strategyIndex: 0, strategyKind: 'css', position: 0 });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should fall through strategies that find nothing or only blank text', () => {
    const candidate = resolve($, [
      { kind: 'css', selector: '.missing' },
      { kind: 'css', selector: 'h2.blank' },
      { kind: 'xpath', expression: '//h1' },
    ]);

    expect(candidate).toEqual({ text: 'Gol 1.0', strategyIndex: 2, strategyKind: 'xpath', position: 0 });
  });

  it('should return null when every strategy is exhausted', () => {
    expect(resolve($, [{ kind: 'css', selector: '.missing' }, { kind: 'regex', pattern: 'Fiat' }])).toBeNull();
    expect(resolve($, [])).toBeNull();
  });

  it('should skip candidates rejected by the disambiguator', () => {
    const tags: Strategy[] = [{ kind: 'css', selector: '.tags a' }];

    expect(resolve($, tags, { disambiguator: classifiedAs('brand') })).toEqual({
      text: 'VOLKSWAGEN',
      strategyIndex: 0,
      strategyKind: 'css',
      position: 0,
    });
    expect(resolve($, tags, { disambiguator: classifiedAs('year') })).toEqual({
      text: '2019',
      strategyIndex: 0,
      strategyKind: 'css',
      position: 1,
    });
  });

  it('should pass trimmed text to the disambiguator', () => {
    const disambiguator = jest.fn().mockReturnValue(true);

    resolve(load('<p>  Ana  </p>'), [{ kind: 'css', selector: 'p' }], { disambiguator });

    expect(disambiguator).toHaveBeenCalledWith('Ana');
  });
});
