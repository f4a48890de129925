import { describe, it, expect } from 'vitest';
import { ConfigurationError, ValidationError } from '@strata/utils';
import {
  EncoderRegistry,
  LabelBinarizer,
  MinMaxScaler,
  OneHotEncoder,
  OrdinalEncoder,
  RobustScaler,
  StandardScaler,
  coerceEncoderOptions,
} from '../../src/features/encoders/index.js';

describe('StandardScaler', () => {
  it('should center and scale by the population deviation', () => {
    const scaler = new StandardScaler();
    scaler.fit([[1], [2], [3]]);

    const encoded = scaler.transform([[1], [2], [3]]);
    expect(encoded[0]?.[0]).toBeCloseTo(-1.2247, 4);
    expect(encoded[1]?.[0]).toBe(0);
    expect(encoded[2]?.[0]).toBeCloseTo(1.2247, 4);
    expect(scaler.getParams()).toEqual({ mean: [2], scale: [Math.sqrt(2 / 3)] });
  });

  it('should leave constant columns unscaled', () => {
    const scaler = new StandardScaler();
    scaler.fit([[4], [4]]);

    expect(scaler.transform([[5]])).toEqual([[1]]);
  });

  it('should ignore missing values while fitting', () => {
    const scaler = new StandardScaler();
    scaler.fit([[1], [null], [3]]);

    expect(scaler.getParams()).toEqual({ mean: [2], scale: [1] });
  });

  it('should invert its transform', () => {
    const scaler = new StandardScaler();
    const rows = [
      [1.5, 10],
      [2.5, 30],
      [7, 20],
    ];
    scaler.fit(rows);

    const decoded = scaler.inverseTransform(scaler.transform(rows));
    decoded.forEach((row, r) =>
      row.forEach((value, c) => expect(value).toBeCloseTo(rows[r]?.[c] ?? Number.NaN, 10))
    );
  });

  it('should refuse to transform before fit', () => {
    expect(() => new StandardScaler().transform([[1]])).toThrow('standard_scaler used before fit');
  });
});

describe('MinMaxScaler', () => {
  it('should map the fitted range onto featureRange', () => {
    const scaler = new MinMaxScaler({ featureRange: [-1, 1] });
    scaler.fit([[0], [5], [10]]);

    expect(scaler.transform([[0], [5], [10]])).toEqual([[-1], [0], [1]]);
    expect(scaler.inverseTransform([[0]])).toEqual([[5]]);
  });
});

describe('RobustScaler', () => {
  it('should center on the median and scale by the IQR', () => {
    const scaler = new RobustScaler();
    scaler.fit([[1], [2], [3], [4], [5]]);

    expect(scaler.getParams()).toEqual({ center: [3], scale: [2] });
    expect(scaler.transform([[5]])).toEqual([[1]]);
  });
});

describe('OneHotEncoder', () => {
  it('should emit one indicator column per category', () => {
    const encoder = new OneHotEncoder();
    encoder.fit([['b'], ['a'], ['b']]);

    expect(encoder.outputColumns(['color'])).toEqual(['color=a', 'color=b']);
    expect(encoder.transform([['b'], ['a']])).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  it('should encode unknown categories as zeros and decode them as missing', () => {
    const encoder = new OneHotEncoder();
    encoder.fit([['a'], ['b']]);

    expect(encoder.transform([['z']])).toEqual([[0, 0]]);
    expect(encoder.inverseTransform([[0, 0]])).toEqual([[null]]);
  });

  it('should reject unknown categories when asked to', () => {
    const encoder = new OneHotEncoder({ handleUnknown: 'error' });
    encoder.fit([['a']]);

    expect(() => encoder.transform([['z']])).toThrow(ValidationError);
  });

  it('should round-trip several columns', () => {
    const encoder = new OneHotEncoder();
    const rows = [
      ['x', true],
      ['y', false],
      ['x', false],
    ];
    encoder.fit(rows);

    expect(encoder.outputColumns(['letter', 'flag'])).toEqual(['letter=x', 'letter=y', 'flag=false', 'flag=true']);
    expect(encoder.inverseTransform(encoder.transform(rows))).toEqual(rows);
  });
});

describe('OrdinalEncoder', () => {
  it('should code categories by sorted position', () => {
    const encoder = new OrdinalEncoder();
    encoder.fit([['low'], ['high'], ['mid']]);

    expect(encoder.transform([['high'], ['low'], ['mid']])).toEqual([[0], [1], [2]]);
    expect(encoder.inverseTransform([[2]])).toEqual([['mid']]);
  });

  it('should throw on unknown categories by default', () => {
    const encoder = new OrdinalEncoder();
    encoder.fit([['a']]);

    expect(() => encoder.transform([['b']])).toThrow(ValidationError);
  });

  it('should use unknownValue when unknowns are ignored', () => {
    const encoder = new OrdinalEncoder({ handleUnknown: 'ignore', unknownValue: -1 });
    encoder.fit([['a']]);

    expect(encoder.transform([['b']])).toEqual([[-1]]);
  });
});

describe('LabelBinarizer', () => {
  it('should emit a single column for two classes', () => {
    const binarizer = new LabelBinarizer();
    binarizer.fit([['no'], ['yes'], ['no']]);

    expect(binarizer.outputColumns(['answer'])).toEqual(['answer=yes']);
    expect(binarizer.transform([['yes'], ['no']])).toEqual([[1], [0]]);
    expect(binarizer.inverseTransform([[0.8], [0.1]])).toEqual([['yes'], ['no']]);
  });

  it('should one-hot more than two classes', () => {
    const binarizer = new LabelBinarizer();
    binarizer.fit([[3], [1], [2]]);

    expect(binarizer.transform([[2]])).toEqual([[0, 1, 0]]);
    expect(binarizer.inverseTransform([[0.1, 0.2, 0.7]])).toEqual([[3]]);
  });

  it('should refuse more than one column', () => {
    expect(() => new LabelBinarizer().fit([[1, 2]])).toThrow(RangeError);
  });
});

describe('EncoderRegistry', () => {
  const registry = new EncoderRegistry();

  it('should list the built-in kinds', () => {
    expect(registry.listKinds()).toEqual([
      'standard_scaler',
      'min_max_scaler',
      'robust_scaler',
      'one_hot_encoder',
      'ordinal_encoder',
      'label_binarizer',
    ]);
  });

  it('should reject unknown kinds', () => {
    expect(() => registry.require('pca', 'encoders[0]')).toThrow(ConfigurationError);
  });

  it('should reject unknown options', () => {
    expect(() => registry.create('standard_scaler', { withMedian: true }, 'encoders[0]')).toThrow(
      /Invalid options for standard_scaler/
    );
  });

  it('should force dense output and copying', () => {
    expect(coerceEncoderOptions('one_hot_encoder', { sparse: true, sparseOutput: true, copy: false })).toEqual({
      sparse: false,
      sparseOutput: false,
      copy: true,
    });
  });

  it('should register custom kinds', () => {
    const custom = new EncoderRegistry();
    custom.register({
      kind: 'identity',
      name: 'Identity',
      numericOnly: true,
      supportsMultipleColumns: true,
      create: () => new StandardScaler({ withMean: false, withStd: false }),
    });

    expect(custom.get('identity')?.name).toBe('Identity');
  });
});
