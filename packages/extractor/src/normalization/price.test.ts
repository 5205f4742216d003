import { formatBrl, parseBrlAmount } from './price';

describe('parseBrlAmount', () => {
  it('should read "." as a thousands separator', () => {
    expect(parseBrlAmount('45.900')).toBe(45900);
    expect(parseBrlAmount('1.250.000')).toBe(1250000);
  });

  it('should read "," as the decimal point', () => {
    expect(parseBrlAmount('1.299,50')).toBe(1299.5);
    expect(parseBrlAmount('0,99')).toBe(0.99);
  });

  it('should strip currency and unit tokens', () => {
    expect(parseBrlAmount('R$ 45.900')).toBe(45900);
    expect(parseBrlAmount('R$  18.500')).toBe(18500);
    expect(parseBrlAmount('87.000 km')).toBe(87000);
  });

  it('should parse plain integers', () => {
    expect(parseBrlAmount('2019')).toBe(2019);
  });

  it('should return null for non-numeric text', () => {
    expect(parseBrlAmount('')).toBeNull();
    expect(parseBrlAmount('Consulte')).toBeNull();
    expect(parseBrlAmount('GOL 1.0')).toBeNull();
    expect(parseBrlAmount('1,2,3')).toBeNull();
  });
});

describe('formatBrl', () => {
  it('should group thousands with dots', () => {
    expect(formatBrl(99900)).toBe('R$ 99.900');
    expect(formatBrl(1250000)).toBe('R$ 1.250.000');
  });

  it('should not group short amounts', () => {
    expect(formatBrl(950)).toBe('R$ 950');
  });

  it('should round to whole reais', () => {
    expect(formatBrl(21000.4)).toBe('R$ 21.000');
  });

  it('should round-trip through parseBrlAmount', () => {
    expect(parseBrlAmount(formatBrl(45900))).toBe(45900);
  });
});
