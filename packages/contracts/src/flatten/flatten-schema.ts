/**
 * Declarative flatten schema: nested field -> output column -> path.
 */

import { z } from 'zod';
import { ContractsError } from '../errors/index.js';

const segmentSchema = z.string().min(1);

/** One or two key segments inside the nested mapping */
export const columnPathSchema = z.union([
  z.tuple([segmentSchema]),
  z.tuple([segmentSchema, segmentSchema]),
]);

export const columnMappingSchema = z
  .object({
    column: z.string().min(1),
    path: columnPathSchema,
  })
  .strict();

export const nestedFieldSchema = z
  .object({
    field: z.string().min(1),
    columns: z.array(columnMappingSchema).min(1),
  })
  .strict();

export const flattenSchemaSchema = z.array(nestedFieldSchema).superRefine((fields, ctx) => {
  const nestedNames = new Set<string>();
  const columnOwners = new Map<string, string>();

  fields.forEach((entry, i) => {
    if (nestedNames.has(entry.field)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Nested field "${entry.field}" is declared twice`,
        path: [i, 'field'],
      });
    }
    nestedNames.add(entry.field);
  });

  fields.forEach((entry, i) => {
    entry.columns.forEach((mapping, j) => {
      const owner = columnOwners.get(mapping.column);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Column "${mapping.column}" is already produced by "${owner}"`,
          path: [i, 'columns', j, 'column'],
        });
      }
      if (nestedNames.has(mapping.column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Column "${mapping.column}" collides with a nested field that is dropped after flattening`,
          path: [i, 'columns', j, 'column'],
        });
      }
      columnOwners.set(mapping.column, entry.field);
    });
  });
});

export type ColumnPath = z.infer<typeof columnPathSchema>;
export type ColumnMapping = z.infer<typeof columnMappingSchema>;
export type NestedField = z.infer<typeof nestedFieldSchema>;
export type FlattenSchema = z.infer<typeof flattenSchemaSchema>;

export function formatSchemaIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Validate a flatten schema, failing fast with MAPPING_ERROR
 */
export function validateFlattenSchema(input: unknown): FlattenSchema {
  const result = flattenSchemaSchema.safeParse(input);
  if (!result.success) {
    throw new ContractsError({
      code: 'MAPPING_ERROR',
      message: `Invalid flatten schema:\n${formatSchemaIssues(result.error)}`,
      suggestion: 'Each column needs a unique name and a path of one or two keys.',
    });
  }
  return result.data;
}

function column(name: string, ...path: ColumnPath): ColumnMapping {
  return { column: name, path };
}

/** Nested contract fields and the columns hoisted out of them */
export const CONTRACT_FLATTEN_SCHEMA: FlattenSchema = [
  {
    field: 'compra',
    columns: [
      column('codNumCompra', 'numero'),
      column('objeto_Compra', 'objeto'),
      column('numeroProcesso_Compra', 'numeroProcesso'),
      column('contatoResponsavel_Compra', 'contatoResponsavel'),
    ],
  },
  {
    field: 'unidadeGestora',
    columns: [
      column('codUnidadeGestora', 'codigo'),
      column('nome_UnidadeGestora', 'nome'),
      column('descricaoPoder_UnidadeGestora', 'descricaoPoder'),
      column('orgaoVinculado_codigoSIAFI', 'orgaoVinculado', 'codigoSIAFI'),
      column('orgaoVinculado_cnpj', 'orgaoVinculado', 'cnpj'),
      column('orgaoVinculado_sigla', 'orgaoVinculado', 'sigla'),
      column('orgaoVinculado_nome', 'orgaoVinculado', 'nome'),
      column('orgaoMaximo_codigo', 'orgaoMaximo', 'codigo'),
      column('orgaoMaximo_sigla', 'orgaoMaximo', 'sigla'),
      column('orgaoMaximo_nome', 'orgaoMaximo', 'nome'),
    ],
  },
  {
    field: 'fornecedor',
    columns: [
      column('id_fornecedor', 'id'),
      column('cpfFormatado_fornecedor', 'cpfFormatado'),
      column('cnpjFormatado_fornecedor', 'cnpjFormatado'),
      column('numeroInscricaoSocial_fornecedor', 'numeroInscricaoSocial'),
      column('nome_fornecedor', 'nome'),
      column('razaoSocialReceita_fornecedor', 'razaoSocialReceita'),
      column('nomeFantasiaReceita_fornecedor', 'nomeFantasiaReceita'),
      column('tipo_fornecedor', 'tipo'),
    ],
  },
  {
    field: 'unidadeGestoraCompras',
    columns: [
      column('codigo_UnidadeGestoraCompras', 'codigo'),
      column('nome_UnidadeGestoraCompras', 'nome'),
    ],
  },
];

/** Currency columns rewritten into Brazilian notation after flattening */
export const CONTRACT_CURRENCY_COLUMNS = ['valorInicialCompra', 'valorFinalCompra'] as const;
