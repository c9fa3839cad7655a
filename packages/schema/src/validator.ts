/**
 * @tidemark/schema — Semantic validation.
 *
 * The parser only checks syntax. This pass resolves type references and
 * checks attribute arguments; problems are reported, never corrected.
 *
 * @module @tidemark/schema
 */

import {
  PROVIDER_NAMES,
  SchemaSyntaxError,
  ValidationError,
  isProviderName,
  type ValidationIssue,
} from '@tidemark/core';

import {
  type Attribute,
  type Model,
  type Schema,
  findAttribute,
  findAttributes,
  getArgument,
  getProperty,
  isScalarType,
  valueAsNameList,
  valueAsString,
} from './ast.js';
import { parseSchema } from './parser.js';

const REFERENTIAL_ACTIONS = new Set(['Cascade', 'Restrict', 'NoAction', 'SetNull', 'SetDefault']);

/**
 * Validate a parsed schema and return every issue found.
 */
export function validateSchema(schema: Schema): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  validateDatasources(schema, issues);
  validateGenerators(schema, issues);

  const modelNames = new Set<string>();
  const enumNames = new Set<string>();

  for (const enumDef of schema.enums) {
    if (enumNames.has(enumDef.name)) {
      issues.push({ path: enumDef.name, message: `Duplicate enum \`${enumDef.name}\``, line: enumDef.position.line });
    }
    enumNames.add(enumDef.name);

    const seen = new Set<string>();
    for (const value of enumDef.values) {
      if (seen.has(value.name)) {
        issues.push({
          path: `${enumDef.name}.${value.name}`,
          message: `Duplicate value \`${value.name}\` in enum \`${enumDef.name}\``,
          line: value.position.line,
        });
      }
      seen.add(value.name);
    }
    if (enumDef.values.length === 0) {
      issues.push({ path: enumDef.name, message: `Enum \`${enumDef.name}\` has no values`, line: enumDef.position.line });
    }
  }

  for (const model of schema.models) {
    if (modelNames.has(model.name)) {
      issues.push({ path: model.name, message: `Duplicate model \`${model.name}\``, line: model.position.line });
    }
    if (enumNames.has(model.name)) {
      issues.push({
        path: model.name,
        message: `Model \`${model.name}\` has the same name as an enum`,
        line: model.position.line,
      });
    }
    modelNames.add(model.name);
  }

  const models = new Map(schema.models.map((m) => [m.name, m]));
  for (const model of schema.models) {
    validateModel(model, models, enumNames, issues);
  }

  return issues;
}

function validateDatasources(schema: Schema, issues: ValidationIssue[]): void {
  if (schema.datasources.length > 1) {
    const second = schema.datasources[1];
    issues.push({
      path: 'datasource',
      message: 'Only one datasource block is allowed',
      line: second?.position.line,
    });
  }

  for (const datasource of schema.datasources) {
    const path = `datasource.${datasource.name}`;
    const provider = valueAsString(getProperty(datasource, 'provider'));
    if (provider === undefined) {
      issues.push({ path: `${path}.provider`, message: 'Datasource is missing `provider`', line: datasource.position.line });
    } else if (!isProviderName(provider)) {
      issues.push({
        path: `${path}.provider`,
        message: `Unsupported provider \`${provider}\`; expected one of ${PROVIDER_NAMES.join(', ')}`,
        line: datasource.position.line,
      });
    }
    if (getProperty(datasource, 'url') === undefined) {
      issues.push({ path: `${path}.url`, message: 'Datasource is missing `url`', line: datasource.position.line });
    }
  }
}

function validateGenerators(schema: Schema, issues: ValidationIssue[]): void {
  for (const generator of schema.generators) {
    if (getProperty(generator, 'provider') === undefined) {
      issues.push({
        path: `generator.${generator.name}.provider`,
        message: 'Generator is missing `provider`',
        line: generator.position.line,
      });
    }
  }
}

function validateModel(
  model: Model,
  models: Map<string, Model>,
  enumNames: Set<string>,
  issues: ValidationIssue[],
): void {
  const fieldNames = new Set<string>();
  const scalarFields = new Set<string>();

  for (const field of model.fields) {
    const path = `${model.name}.${field.name}`;
    if (fieldNames.has(field.name)) {
      issues.push({ path, message: `Duplicate field \`${field.name}\``, line: field.position.line });
    }
    fieldNames.add(field.name);

    const typeName = field.type.name;
    const isRelation = models.has(typeName);
    if (!isScalarType(typeName) && !isRelation && !enumNames.has(typeName) && field.type.unsupported === undefined) {
      issues.push({ path, message: `Unknown type \`${typeName}\``, line: field.position.line });
    }
    if (!isRelation) scalarFields.add(field.name);

    const defaultAttr = findAttribute(field.attributes, 'default');
    if (defaultAttr && defaultAttr.args.length === 0) {
      issues.push({ path, message: '`@default` requires a value', line: defaultAttr.position.line });
    }

    const relation = findAttribute(field.attributes, 'relation');
    if (relation) {
      const target = models.get(typeName);
      if (!target) {
        issues.push({
          path,
          message: `\`@relation\` is only allowed on fields whose type is a model`,
          line: relation.position.line,
        });
      } else {
        validateRelation(model, path, relation, target, issues);
      }
    }
  }

  for (const name of ['id', 'unique', 'index']) {
    for (const attribute of findAttributes(model.attributes, name)) {
      const fields = valueAsNameList(getArgument(attribute, 'fields', 0));
      if (!fields || fields.length === 0) {
        issues.push({
          path: model.name,
          message: `\`@@${name}\` requires a list of fields`,
          line: attribute.position.line,
        });
        continue;
      }
      for (const fieldName of fields) {
        if (!scalarFields.has(fieldName)) {
          issues.push({
            path: model.name,
            message: `\`@@${name}\` references unknown scalar field \`${fieldName}\``,
            line: attribute.position.line,
          });
        }
      }
    }
  }

  const hasId =
    model.fields.some((f) => findAttribute(f.attributes, 'id')) || findAttribute(model.attributes, 'id') !== undefined;
  const hasUnique =
    model.fields.some((f) => findAttribute(f.attributes, 'unique')) ||
    findAttribute(model.attributes, 'unique') !== undefined;
  if (!hasId && !hasUnique) {
    issues.push({
      path: model.name,
      message: `Model \`${model.name}\` needs an \`@id\`, \`@@id\`, \`@unique\` or \`@@unique\``,
      line: model.position.line,
    });
  }
}

function validateRelation(
  model: Model,
  path: string,
  relation: Attribute,
  target: Model,
  issues: ValidationIssue[],
): void {
  const line = relation.position.line;
  const fieldsArg = getArgument(relation, 'fields');
  const referencesArg = getArgument(relation, 'references');

  // Neither argument: back-relation side, nothing to check.
  if (fieldsArg === undefined && referencesArg === undefined) {
    validateActions(path, relation, issues);
    return;
  }

  if (fieldsArg === undefined || referencesArg === undefined) {
    issues.push({ path, message: '`@relation` needs both `fields` and `references`', line });
  } else {
    const fields = valueAsNameList(fieldsArg);
    const references = valueAsNameList(referencesArg);
    if (!fields || !references) {
      issues.push({ path, message: '`fields` and `references` must be lists of field names', line });
    } else {
      if (fields.length !== references.length) {
        issues.push({
          path,
          message: `\`fields\` has ${fields.length} entries but \`references\` has ${references.length}`,
          line,
        });
      }
      for (const name of fields) {
        if (!model.fields.some((f) => f.name === name)) {
          issues.push({ path, message: `Relation field \`${name}\` does not exist on \`${model.name}\``, line });
        }
      }
      for (const name of references) {
        if (!target.fields.some((f) => f.name === name)) {
          issues.push({ path, message: `Referenced field \`${name}\` does not exist on \`${target.name}\``, line });
        }
      }
    }
  }

  validateActions(path, relation, issues);
}

function validateActions(path: string, relation: Attribute, issues: ValidationIssue[]): void {
  const line = relation.position.line;
  for (const action of ['onDelete', 'onUpdate']) {
    const value = getArgument(relation, action);
    if (value === undefined) continue;
    const name = valueAsString(value);
    if (value.kind !== 'identifier' || name === undefined || !REFERENTIAL_ACTIONS.has(name)) {
      issues.push({
        path,
        message: `Invalid \`${action}\`; expected one of ${[...REFERENTIAL_ACTIONS].join(', ')}`,
        line,
      });
    }
  }
}

/**
 * Throw when the schema has validation issues.
 */
export function assertValidSchema(schema: Schema): void {
  const issues = validateSchema(schema);
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}

/**
 * Parse and validate declaration text, throwing on the first failing stage.
 *
 * @throws SchemaSyntaxError when the text does not parse
 * @throws ValidationError when the parsed schema is semantically invalid
 */
export function loadSchema(text: string): Schema {
  const result = parseSchema(text);
  if (!result.success) {
    throw new SchemaSyntaxError(result.errors);
  }
  assertValidSchema(result.schema);
  return result.schema;
}
