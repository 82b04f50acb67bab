import { AnchorNotFoundError, SchemaDriftError, SchemaTooNarrowError } from '../errors.js';
import { requiredFieldCount } from './target-schema.js';
import type { AnchorColumn, ColumnMapping, FieldMapping, SourceProfile, TargetSchema } from './types.js';

const normalizeAlias = (value: string): string => value.trim().toLowerCase();

/** Anchors are found by alias anywhere in the header, never by index. */
export function locateAnchors(profile: SourceProfile, anchors: readonly AnchorColumn[]): Record<string, number> {
  const header = profile.header.map(normalizeAlias);
  const located: Record<string, number> = {};
  for (const anchor of anchors) {
    const aliases = new Set(anchor.aliases.map(normalizeAlias));
    const index = header.findIndex((name) => name !== '' && aliases.has(name));
    if (index >= 0) {
      located[anchor.id] = index;
    } else if (anchor.required) {
      throw new AnchorNotFoundError(anchor.id, anchor.aliases);
    }
  }
  return located;
}

/**
 * Map every target field onto a source column.
 *
 * Phase one matches header names (field name, then aliases). Phase two falls
 * back to the field's canonical position, which is only sound while new
 * columns are appended after the known core. If a name-matched column has
 * moved while some other field still needs its position, the source has
 * drifted inside the core and reconciliation stops.
 */
export function reconcile(
  profile: SourceProfile,
  schema: TargetSchema,
  anchors: readonly AnchorColumn[] = []
): ColumnMapping {
  const anchorPositions = locateAnchors(profile, anchors);

  const required = requiredFieldCount(schema);
  if (profile.columnCount < required) {
    throw new SchemaTooNarrowError(
      `source has ${profile.columnCount} columns but the target requires at least ${required}`,
      { columnCount: profile.columnCount, requiredFields: required }
    );
  }

  const claimed = new Map<number, number>();
  const fields: Array<FieldMapping | undefined> = new Array(schema.fields.length);

  schema.fields.forEach((field, fieldIndex) => {
    for (const candidate of [field.name, ...field.aliases]) {
      const key = candidate.trim();
      if (!Object.hasOwn(profile.columnPositions, key)) continue;
      const sourceIndex = profile.columnPositions[key];
      if (sourceIndex !== undefined && !claimed.has(sourceIndex)) {
        claimed.set(sourceIndex, fieldIndex);
        fields[fieldIndex] = { fieldIndex, field: field.name, column: field.column, sourceIndex, strategy: 'name' };
        return;
      }
    }
  });

  const displaced = fields.filter(
    (mapping): mapping is FieldMapping => mapping !== undefined && mapping.sourceIndex !== mapping.fieldIndex
  );
  const positional: number[] = [];

  schema.fields.forEach((field, fieldIndex) => {
    if (fields[fieldIndex]) return;
    const base = { fieldIndex, field: field.name, column: field.column };

    if (fieldIndex < profile.columnCount) {
      const holder = claimed.get(fieldIndex);
      if (holder === undefined) {
        positional.push(fieldIndex);
        fields[fieldIndex] = { ...base, sourceIndex: fieldIndex, strategy: 'position' };
        return;
      }
      // the holder moved here from its own position, so this field's data moved as well
      const heldBy = schema.fields[holder]?.name ?? '';
      throw new SchemaDriftError(
        `field "${field.name}" has no header match and column ${fieldIndex + 1} holds field "${heldBy}"; ` +
          'columns were inserted or reordered inside the known core',
        { field: field.name, position: fieldIndex + 1, heldBy }
      );
    }
    if (field.nullable) {
      fields[fieldIndex] = { ...base, sourceIndex: null, strategy: 'absent' };
      return;
    }
    throw new SchemaTooNarrowError(
      `required field "${field.name}" expects column ${fieldIndex + 1} but the source has ${profile.columnCount}`,
      { field: field.name, position: fieldIndex + 1, columnCount: profile.columnCount }
    );
  });

  const firstDisplaced = displaced[0];
  if (firstDisplaced && positional.length) {
    const sourceIndex = firstDisplaced.sourceIndex ?? firstDisplaced.fieldIndex;
    throw new SchemaDriftError(
      `field "${firstDisplaced.field}" expected at column ${firstDisplaced.fieldIndex + 1} was found at column ${sourceIndex + 1} ` +
        `while ${positional.length} field(s) rely on position; columns were inserted or reordered inside the known core`,
      {
        field: firstDisplaced.field,
        expectedPosition: firstDisplaced.fieldIndex + 1,
        foundPosition: sourceIndex + 1,
        positionalFields: positional.map((index) => schema.fields[index]?.name),
      }
    );
  }

  const mapped = new Set([...claimed.keys(), ...positional]);
  const droppedColumns = profile.header
    .map((header, index) => ({ index, header }))
    .filter(({ index }) => !mapped.has(index));

  return {
    fields: fields.filter((mapping): mapping is FieldMapping => mapping !== undefined),
    anchors: anchorPositions,
    droppedColumns,
  };
}
