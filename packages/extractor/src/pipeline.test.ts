import { load } from 'cheerio';
import type { AcquisitionBackend, FieldSpec } from '@autofields/shared';
import { runExtraction } from './pipeline';
import * as acquireModule from './fetcher/acquire';
import type { AcquiredPage } from './fetcher/acquire';
import { AcquisitionError } from './errors';
import type { ExtractionEvent } from './events';

jest.mock('./fetcher/acquire');

const AD_URL = 'https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/gol-1-0-1457220451';

const SPECS: FieldSpec[] = [
  { name: 'model', required: true, strategies: [{ kind: 'css', selector: 'h1' }] },
  { name: 'price', required: true, strategies: [{ kind: 'css', selector: '.price' }] },
  { name: 'phone', required: false, strategies: [{ kind: 'css', selector: '.phone' }] },
];

function page(backend: AcquisitionBackend, html: string): AcquiredPage {
  return { url: AD_URL, finalUrl: AD_URL, backend, html, $: load(html), attempts: [] };
}

function recorder() {
  const events: ExtractionEvent[] = [];
  return { events, sink: { emit: (event: ExtractionEvent) => events.push(event) } };
}

const FULL = '<h1>Gol 1.0</h1><p class="price">R$ 45.900</p>';
const SKELETON = '<div id="app"><span class="phone">Carregando</span></div>';

describe('runExtraction', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should extract from the acquired page', async () => {
    (acquireModule.acquirePage as jest.Mock).mockResolvedValue(page('dynamic', FULL));

    const report = await runExtraction(AD_URL, SPECS, { events: recorder().sink });

    expect(report.backend).toBe('dynamic');
    expect(report.url).toBe(AD_URL);
    expect(report.missingRequired).toEqual([]);
    expect(acquireModule.acquirePage).toHaveBeenCalledTimes(1);
  });

  it('should retry statically when the rendered page resolved no required field', async () => {
    (acquireModule.acquirePage as jest.Mock)
      .mockResolvedValueOnce(page('dynamic', SKELETON))
      .mockResolvedValueOnce(page('static', FULL));
    const { events, sink } = recorder();

    const report = await runExtraction(AD_URL, SPECS, { events: sink });

    expect(report.backend).toBe('static');
    expect(report.complete).toBe(true);
    expect(acquireModule.acquirePage).toHaveBeenLastCalledWith(AD_URL, expect.objectContaining({ mode: 'static' }));
    expect(events).toContainEqual({
      type: 'backend_fallback',
      url: AD_URL,
      from: 'dynamic',
      to: 'static',
      reason: 'no required field resolved',
    });
  });

  it('should keep the rendered report when the static page is no better', async () => {
    (acquireModule.acquirePage as jest.Mock)
      .mockResolvedValueOnce(page('dynamic', SKELETON))
      .mockResolvedValueOnce(page('static', '<p>blocked</p>'));

    const report = await runExtraction(AD_URL, SPECS, { events: recorder().sink });

    expect(report.backend).toBe('dynamic');
    expect(report.resolvedCount).toBe(1);
  });

  it('should keep the rendered report when the static retry fails', async () => {
    (acquireModule.acquirePage as jest.Mock)
      .mockResolvedValueOnce(page('dynamic', SKELETON))
      .mockRejectedValueOnce(new AcquisitionError(AD_URL, []));

    const report = await runExtraction(AD_URL, SPECS, { events: recorder().sink });

    expect(report.backend).toBe('dynamic');
    expect(report.missingRequired).toEqual(['model', 'price']);
  });

  it('should not retry when disabled or when the page came from the static backend', async () => {
    (acquireModule.acquirePage as jest.Mock).mockResolvedValue(page('dynamic', SKELETON));
    await runExtraction(AD_URL, SPECS, { events: recorder().sink, fallbackOnEmptyReport: false });
    expect(acquireModule.acquirePage).toHaveBeenCalledTimes(1);

    jest.clearAllMocks();
    (acquireModule.acquirePage as jest.Mock).mockResolvedValue(page('static', SKELETON));
    await runExtraction(AD_URL, SPECS, { events: recorder().sink });
    expect(acquireModule.acquirePage).toHaveBeenCalledTimes(1);
  });

  it('should propagate total acquisition failure', async () => {
    (acquireModule.acquirePage as jest.Mock).mockRejectedValue(new AcquisitionError(AD_URL, []));

    await expect(runExtraction(AD_URL, SPECS, { events: recorder().sink })).rejects.toBeInstanceOf(AcquisitionError);
  });
});
