/**
 * Feature / label column selection
 */

import type { Dataset } from '@strata/core';
import { ConfigurationError } from '@strata/utils';

export interface ColumnSelection {
  includeColumns?: readonly string[];
  excludeColumns?: readonly string[];
}

/**
 * Resolve the columns a feature uses, in dataset order.
 * `reserved` columns (the label, when it shares the dataset) are never features.
 */
export function selectFeatureColumns(
  dataset: Dataset,
  selection: ColumnSelection,
  configKey: string,
  reserved: readonly string[] = []
): string[] {
  const { includeColumns, excludeColumns } = selection;
  if (includeColumns !== undefined && excludeColumns !== undefined) {
    throw new ConfigurationError(
      'includeColumns and excludeColumns are mutually exclusive',
      configKey,
      { datasetId: dataset.id }
    );
  }

  for (const column of [...(includeColumns ?? []), ...(excludeColumns ?? [])]) {
    if (!dataset.columns.includes(column)) {
      throw new ConfigurationError(
        `Column '${column}' does not exist in dataset '${dataset.id}'`,
        configKey,
        { datasetId: dataset.id, column }
      );
    }
  }

  const reservedIncluded = (includeColumns ?? []).filter((column) => reserved.includes(column));
  if (reservedIncluded.length > 0) {
    throw new ConfigurationError(
      `Label column(s) ${reservedIncluded.join(', ')} cannot also be features`,
      configKey,
      { datasetId: dataset.id }
    );
  }

  const selected = dataset.columns.filter((column) => {
    if (reserved.includes(column)) {
      return false;
    }
    if (includeColumns !== undefined) {
      return includeColumns.includes(column);
    }
    return !(excludeColumns ?? []).includes(column);
  });

  if (selected.length === 0) {
    throw new ConfigurationError(`Feature selection on dataset '${dataset.id}' leaves no columns`, configKey, {
      datasetId: dataset.id,
    });
  }
  return selected;
}

/**
 * Normalize and check label columns
 */
export function selectLabelColumns(dataset: Dataset, column: string | readonly string[], configKey: string): string[] {
  const columns = typeof column === 'string' ? [column] : [...column];
  if (columns.length === 0) {
    throw new ConfigurationError('Label needs at least one column', configKey);
  }
  if (new Set(columns).size !== columns.length) {
    throw new ConfigurationError('Label columns must be distinct', configKey);
  }
  for (const name of columns) {
    if (!dataset.columns.includes(name)) {
      throw new ConfigurationError(`Label column '${name}' does not exist in dataset '${dataset.id}'`, configKey, {
        datasetId: dataset.id,
        column: name,
      });
    }
  }
  return columns;
}
