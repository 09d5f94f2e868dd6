import { describe, expect, it } from 'vitest';
import { LiteralSyntaxError, parseLiteral } from '../src/index.js';

describe('parseLiteral', () => {
  it('decodes a single-quoted mapping', () => {
    expect(parseLiteral("{'numero': '123', 'objeto': 'X'}")).toEqual({ numero: '123', objeto: 'X' });
  });

  it('decodes JSON', () => {
    expect(parseLiteral('{"codigo": "170001", "ativo": true, "valor": 12.5}')).toEqual({
      codigo: '170001',
      ativo: true,
      valor: 12.5,
    });
  });

  it('decodes nested mappings, keywords, tuples and trailing commas', () => {
    expect(
      parseLiteral("{'orgaoVinculado': {'sigla': 'MEC', 'cnpj': None,}, 'flags': (True, False), 'n': -3}")
    ).toEqual({
      orgaoVinculado: { sigla: 'MEC', cnpj: null },
      flags: [true, false],
      n: -3,
    });
  });

  it('handles escapes inside strings', () => {
    expect(parseLiteral("{'nome': 'D\\'Avila \\u00c1gua', 'obs': \"linha\\nnova\"}")).toEqual({
      nome: "D'Avila Água",
      obs: 'linha\nnova',
    });
  });

  it('decodes octal and long unicode escapes', () => {
    expect(parseLiteral("{'a': '\\101\\0', 'b': '\\U0001F600!', 'c': '\\x41\\7'}")).toEqual({
      a: 'A\0',
      b: '\u{1F600}!',
      c: 'A\x07',
    });
  });

  it('rejects malformed long unicode escapes', () => {
    expect(() => parseLiteral("{'a': '\\U0011FFFF'}")).toThrow(LiteralSyntaxError);
    expect(() => parseLiteral("{'a': '\\U1F600'}")).toThrow(LiteralSyntaxError);
  });

  it('rejects bare words', () => {
    expect(() => parseLiteral('not-a-dict')).toThrow(LiteralSyntaxError);
    expect(() => parseLiteral('not-a-dict')).toThrow('Unexpected identifier "not" at position 0');
  });

  it('rejects unterminated input', () => {
    expect(() => parseLiteral("{'numero': '123'")).toThrow(LiteralSyntaxError);
    expect(() => parseLiteral("{'numero': '123")).toThrow('Unterminated string at position 11');
  });

  it('rejects trailing garbage', () => {
    expect(() => parseLiteral("{'a': 1} x")).toThrow('Unexpected "x" at position 9');
  });

  it('keeps a __proto__ key as plain data', () => {
    const decoded = parseLiteral("{'__proto__': {'polluted': 1}}");

    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    expect(Object.keys(Object(decoded))).toEqual(['__proto__']);
  });
});
