import { ERROR_TAXONOMY, getErrorInfo, getErrorMessage } from './error-taxonomy';

describe('error taxonomy', () => {
  it('should describe known codes', () => {
    expect(getErrorInfo('FETCH_TIMEOUT')).toBe(ERROR_TAXONOMY.FETCH_TIMEOUT);
    expect(getErrorMessage('ACQUISITION_FAILED')).toBe(
      'Page Unavailable: Neither the browser nor the plain HTTP fetch could load the page.'
    );
  });

  it('should mark total acquisition failure as the only critical error', () => {
    const critical = Object.entries(ERROR_TAXONOMY)
      .filter(([, info]) => info.severity === 'critical')
      .map(([code]) => code);

    expect(critical).toEqual(['ACQUISITION_FAILED']);
  });

  it('should fall back to generic info for unknown codes', () => {
    expect(getErrorInfo('SOMETHING_ELSE')).toMatchObject({ title: 'Unknown Error', description: 'Error: SOMETHING_ELSE' });
  });

  it('should return nothing without a code', () => {
    expect(getErrorInfo(null)).toBeNull();
    expect(getErrorMessage(null)).toBe('');
  });

  it('should not treat inherited properties as codes', () => {
    expect(getErrorInfo('toString')).toMatchObject({ title: 'Unknown Error' });
  });
});
