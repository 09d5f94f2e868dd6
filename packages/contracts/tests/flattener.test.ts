import { describe, expect, it } from 'vitest';
import {
  CONTRACT_FLATTEN_SCHEMA,
  ContractsError,
  RecordFlattener,
  extractPath,
  validateFlattenSchema,
} from '../src/index.js';
import { captureLogger } from './helpers.js';

describe('flatten schema validation', () => {
  it('accepts the contract schema', () => {
    expect(validateFlattenSchema(CONTRACT_FLATTEN_SCHEMA)).toHaveLength(4);
  });

  it('rejects paths deeper than two segments', () => {
    expect(() =>
      validateFlattenSchema([{ field: 'compra', columns: [{ column: 'x', path: ['a', 'b', 'c'] }] }])
    ).toThrow(ContractsError);
  });

  it('rejects duplicate output columns across fields', () => {
    try {
      validateFlattenSchema([
        { field: 'compra', columns: [{ column: 'codigo', path: ['numero'] }] },
        { field: 'fornecedor', columns: [{ column: 'codigo', path: ['id'] }] },
      ]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ContractsError);
      expect(err).toMatchObject({
        code: 'MAPPING_ERROR',
        message: 'Invalid flatten schema:\n- 1.columns.0.column: Column "codigo" is already produced by "compra"',
      });
    }
  });

  it('rejects columns named after a nested field', () => {
    expect(() =>
      validateFlattenSchema([
        { field: 'compra', columns: [{ column: 'fornecedor', path: ['numero'] }] },
        { field: 'fornecedor', columns: [{ column: 'nome_fornecedor', path: ['nome'] }] },
      ])
    ).toThrow('collides with a nested field');
  });

  it('fails at construction time', () => {
    expect(() => new RecordFlattener([{ field: '', columns: [] }])).toThrow(ContractsError);
  });
});

describe('extractPath', () => {
  it('reads one and two segment paths', () => {
    const mapping = { nome: 'UG', orgaoVinculado: { sigla: 'MEC' } };

    expect(extractPath(mapping, ['nome'])).toBe('UG');
    expect(extractPath(mapping, ['orgaoVinculado', 'sigla'])).toBe('MEC');
  });

  it('returns null for missing keys and non-mapping intermediates', () => {
    const mapping = { nome: 'UG', orgaoMaximo: 'n/a' };

    expect(extractPath(mapping, ['codigo'])).toBeNull();
    expect(extractPath(mapping, ['orgaoVinculado', 'sigla'])).toBeNull();
    expect(extractPath(mapping, ['orgaoMaximo', 'sigla'])).toBeNull();
  });

  it('decodes a string-encoded intermediate mapping', () => {
    expect(extractPath({ orgaoMaximo: "{'sigla': 'MEC'}" }, ['orgaoMaximo', 'sigla'])).toBe('MEC');
  });
});

describe('RecordFlattener', () => {
  it('flattens a string-encoded compra field and drops the original column', () => {
    const flattener = new RecordFlattener(CONTRACT_FLATTEN_SCHEMA);

    const { records, flattenedFields, warnings } = flattener.flatten([
      { id: 1, compra: "{'numero': '123', 'objeto': 'X'}" },
    ]);

    expect(flattenedFields).toEqual(['compra']);
    expect(warnings).toEqual([]);
    expect(records).toEqual([
      {
        id: 1,
        codNumCompra: '123',
        objeto_Compra: 'X',
        numeroProcesso_Compra: null,
        contatoResponsavel_Compra: null,
      },
    ]);
    expect(Object.keys(records[0] ?? {})).not.toContain('compra');
  });

  it('hoists two-level paths from object values', () => {
    const flattener = new RecordFlattener([
      {
        field: 'unidadeGestora',
        columns: [
          { column: 'codUnidadeGestora', path: ['codigo'] },
          { column: 'orgaoVinculado_sigla', path: ['orgaoVinculado', 'sigla'] },
        ],
      },
    ]);

    const { records } = flattener.flatten([
      { id: 7, unidadeGestora: { codigo: '170001', orgaoVinculado: { sigla: 'MEC' } } },
    ]);

    expect(records).toEqual([{ id: 7, codUnidadeGestora: '170001', orgaoVinculado_sigla: 'MEC' }]);
  });

  it('substitutes nulls and warns when a nested field does not decode', () => {
    const { logger, records: logs } = captureLogger();
    const flattener = new RecordFlattener(CONTRACT_FLATTEN_SCHEMA, logger);

    const { records, warnings } = flattener.flatten([{ id: 1, compra: 'not-a-dict' }]);

    expect(records).toEqual([
      {
        id: 1,
        codNumCompra: null,
        objeto_Compra: null,
        numeroProcesso_Compra: null,
        contatoResponsavel_Compra: null,
      },
    ]);
    expect(warnings).toEqual([
      { field: 'compra', index: 0, reason: 'cannot decode string: Unexpected identifier "not" at position 0' },
    ]);
    const warned = logs().filter((r) => r.level === 'warn');
    expect(warned).toHaveLength(1);
    expect(warned[0]).toMatchObject({
      msg: 'Could not decode nested field, using empty mapping',
      field: 'compra',
      index: 0,
    });
  });

  it('fills nulls for records that lack a field other records have', () => {
    const flattener = new RecordFlattener([
      { field: 'fornecedor', columns: [{ column: 'nome_fornecedor', path: ['nome'] }] },
    ]);

    const { records } = flattener.flatten([{ id: 1, fornecedor: { nome: 'ACME' } }, { id: 2 }]);

    expect(records).toEqual([
      { id: 1, nome_fornecedor: 'ACME' },
      { id: 2, nome_fornecedor: null },
    ]);
  });

  it('is a no-op on an already flattened table', () => {
    const flattener = new RecordFlattener(CONTRACT_FLATTEN_SCHEMA);
    const first = flattener.flatten([{ id: 1, compra: { numero: '9' } }]);

    const second = flattener.flatten(first.records);

    expect(second.flattenedFields).toEqual([]);
    expect(second.warnings).toEqual([]);
    expect(second.records).toEqual(first.records);
  });
});
