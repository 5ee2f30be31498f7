import { InvalidInputError } from '../common/errors';
import { validateRadius, validateZip } from './zip-validation';

describe('Zip Code Validation', () => {
  it('should validate and trim 5-digit zip codes', () => {
    expect(validateZip('10001')).toBe('10001');
    expect(validateZip(' 94101 ')).toBe('94101');
    expect(validateZip('00000')).toBe('00000');
  });

  it('should throw InvalidInputError for malformed zip codes', () => {
    expect(() => validateZip('1234')).toThrow(InvalidInputError);
    expect(() => validateZip('123456')).toThrow(InvalidInputError);
    expect(() => validateZip('abcde')).toThrow(InvalidInputError);
    expect(() => validateZip('10001-1234')).toThrow(InvalidInputError);
    expect(() => validateZip('')).toThrow(/5-digit US zip code/);
  });
});

describe('Radius Validation', () => {
  it('should accept positive numbers and numeric strings', () => {
    expect(validateRadius(10)).toBe(10);
    expect(validateRadius(0.5)).toBe(0.5);
    expect(validateRadius('15')).toBe(15);
    expect(validateRadius(' 2.5 ')).toBe(2.5);
  });

  it('should reject zero, negative, blank and non-numeric radii', () => {
    expect(() => validateRadius(0)).toThrow(InvalidInputError);
    expect(() => validateRadius(-3)).toThrow(InvalidInputError);
    expect(() => validateRadius('')).toThrow(InvalidInputError);
    expect(() => validateRadius('ten')).toThrow(InvalidInputError);
    expect(() => validateRadius(Number.POSITIVE_INFINITY)).toThrow(InvalidInputError);
    expect(() => validateRadius(Number.NaN)).toThrow(/positive number of miles/);
  });
});
