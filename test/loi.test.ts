import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Loi, LoiParser, parseLoi } from '../src/loi.js';
import { InvalidLoiError, MissingLoiError } from '../src/errors.js';

describe('loi', () => {
  it('should split a dataset LOI into its parts', () => {
    const loi = parseLoi('42.1001/ds/exp/sa/42/cwepr/1');
    assert.strictEqual(loi.root, '42');
    assert.strictEqual(loi.issuer, '1001');
    assert.strictEqual(loi.type, 'ds');
    assert.strictEqual(loi.id, 'exp/sa/42/cwepr/1');
    assert.deepStrictEqual(loi.idPath, ['exp', 'sa', '42', 'cwepr', '1']);
    assert.strictEqual(loi.prefix, '42.1001');
  });

  it('should serialize back to the parsed string', () => {
    for (const value of ['42.1001/ds/exp/2020-04-25/cwepr/1', '42.1001/rec/42', '42.1001/info/tb/sample/batch/42']) {
      assert.strictEqual(parseLoi(value).toString(), value);
    }
  });

  it('should parse prefixes awaiting a slot', () => {
    const loi = parseLoi('42.1001/ds/exp/sa/42/cwepr');
    assert.deepStrictEqual(loi.idPath, ['exp', 'sa', '42', 'cwepr']);
    assert.strictEqual(parseLoi('42.1001/ds').id, '');
  });

  it('should throw for an empty LOI', () => {
    assert.throws(() => parseLoi(''), MissingLoiError);
  });

  it('should throw for an invalid LOI', () => {
    assert.throws(() => parseLoi('43.1001/ds/exp/sa/42/cwepr/1'), InvalidLoiError);
    assert.throws(() => parseLoi('42.1001/foo/1'), /String is not a valid LOI\./);
  });

  it('should replace the id path', () => {
    const loi = new Loi('42', '1001', 'ds', ['exp', 'sa', '42', 'cwepr']);
    assert.strictEqual(loi.withIdPath(['exp', 'sa', '42', 'cwepr', '3']).toString(), '42.1001/ds/exp/sa/42/cwepr/3');
    assert.strictEqual(loi.toString(), '42.1001/ds/exp/sa/42/cwepr');
  });

  describe('LoiParser', () => {
    it('should return no segments before parsing', () => {
      const parser = new LoiParser();
      assert.deepStrictEqual(parser.splitIdPath(), []);
      assert.strictEqual(parser.loi, undefined);
    });

    it('should remember the last LOI parsed', () => {
      const parser = new LoiParser();
      parser.parse('42.1001/rec/42');
      parser.parse('42.1001/ds/calc/geo/7');
      assert.deepStrictEqual(parser.splitIdPath(), ['calc', 'geo', '7']);
      assert.strictEqual(parser.loi?.type, 'ds');
    });

    it('should give the same result when parsing twice', () => {
      const parser = new LoiParser();
      const first = parser.parse('42.1001/ds/exp/sa/42/cwepr/1').toString();
      const second = parser.parse('42.1001/ds/exp/sa/42/cwepr/1').toString();
      assert.strictEqual(first, second);
    });
  });
});
