// JSON output for extraction results

import { convertProperty, standardConverters } from './resconverters.js';
import type { CanonicalTag, ConvertedProperty, ExtractionResult, PropertyConverter } from './types.js';

export interface JsonDiagnostic {
  code: string;
  name: string;
  message: string;
}

export interface JsonOutput {
  _metadata: {
    format: string;
    path?: string;
    resource_id: number;
    resource_name?: string;
    resource_flags?: number;
    no_properties_found: boolean;
  };
  descriptor: ExtractionResult['descriptor'];
  summary: ExtractionResult['summary'];
  properties: ConvertedProperty[];
  diagnostics: JsonDiagnostic[];
}

export function resultToJsonBlob(
  result: ExtractionResult,
  converters: ReadonlyMap<CanonicalTag, PropertyConverter> = standardConverters
): JsonOutput {
  return {
    _metadata: {
      format: result.format,
      path: result.path,
      resource_id: result.resourceId,
      resource_name: result.resourceName,
      resource_flags: result.resourceFlags,
      no_properties_found: result.noPropertiesFound
    },
    descriptor: result.descriptor,
    summary: result.summary,
    properties: result.properties.map((property, i) => convertProperty(property, i + 1, converters)),
    diagnostics: result.diagnostics.map(issue => ({ code: issue.code, name: issue.name, message: issue.message }))
  };
}

export function resultToJson(
  result: ExtractionResult,
  converters: ReadonlyMap<CanonicalTag, PropertyConverter> = standardConverters
): string {
  return JSON.stringify(resultToJsonBlob(result, converters), null, '\t');
}
