import Ajv, { JSONSchemaType } from 'ajv';
import { ValidationError } from '../errors/SidecarError.js';
import { DEFAULT_STEM_COUNT } from '../jobs/JobStore.js';

export interface SeparateRequestBody {
  filePath: string;
  stemCount?: number | null;
}

// Extra fields sent by older clients (model, device, format, bitrate) are ignored
export const separateRequestSchema: JSONSchemaType<SeparateRequestBody> = {
  type: 'object',
  properties: {
    filePath: { type: 'string', minLength: 1 },
    stemCount: { type: 'integer', minimum: 1, nullable: true }
  },
  required: ['filePath'],
  additionalProperties: true
};

const ajv = new Ajv({ allErrors: true });
const validateSeparate = ajv.compile(separateRequestSchema);

export interface SeparateRequest {
  filePath: string;
  stemCount: number;
}

/**
 * Validate a separation request body, filling in the default stem count
 */
export function parseSeparateRequest(body: unknown): SeparateRequest {
  if (!validateSeparate(body)) {
    throw new ValidationError(
      `Invalid separation request: ${ajv.errorsText(validateSeparate.errors)}`,
      validateSeparate.errors
    );
  }
  return {
    filePath: body.filePath,
    stemCount: body.stemCount ?? DEFAULT_STEM_COUNT
  };
}
