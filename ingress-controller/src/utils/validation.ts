import { z } from 'zod';
import {
  OPTIONAL_INGRESS_RELATION_FIELDS,
  REQUIRED_INGRESS_RELATION_FIELDS,
  type RelationPayload,
  type RequiredIngressField,
} from '../types/ingress';

const NUMERIC_REGEX = /^\d+$/;
const MAX_PORT = 65535;
const DNS_LABEL_REGEX = /^(?=.{1,63}$)[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const optionalNumericText = (field: string) =>
  z
    .union([z.number().int().nonnegative(), z.string().trim()])
    .optional()
    .transform((value) => (value === undefined || value === '' ? undefined : String(value)))
    .refine((value) => value === undefined || NUMERIC_REGEX.test(value), `${field} must be a whole number`);

// A port of 0 means "not configured".
const optionalPort = z
  .union([z.number(), z.string().trim()])
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : Number(value)))
  .transform((value) => (value === 0 ? undefined : value))
  .pipe(
    z
      .number({ invalid_type_error: 'service-port must be a number' })
      .int('service-port must be an integer')
      .min(1, 'service-port must be between 1 and 65535')
      .max(65535, 'service-port must be between 1 and 65535')
      .optional()
  );

export const operatorConfigSchema = z
  .object({
    'service-hostname': optionalText,
    'service-name': optionalText.refine(
      (value) => value === undefined || DNS_LABEL_REGEX.test(value),
      'service-name must be DNS-safe (lowercase letters, digits, dash), max 63 chars, and alphanumeric at ends'
    ),
    'service-port': optionalPort,
    'service-namespace': optionalText,
    'max-body-size': optionalNumericText('max-body-size'),
    'session-cookie-max-age': optionalNumericText('session-cookie-max-age'),
    'tls-secret-name': optionalText,
    // Raw kubeconfig text, kept as written.
    'kube-config': z
      .string()
      .optional()
      .transform((value) => (value && value.trim() ? value : undefined)),
  })
  .strict();

export const relationChangedSchema = z.object({
  app: z.string().min(1, 'app is required'),
  data: z.record(z.string()),
});

export const relationParamsSchema = z.object({
  relationName: z.string().min(1),
  relationId: z.coerce.number().int().nonnegative(),
});

export const storedPayloadSchema = z.record(z.string());

const INGRESS_FIELDS = [...REQUIRED_INGRESS_RELATION_FIELDS, ...OPTIONAL_INGRESS_RELATION_FIELDS];

export class ValidationError extends Error {
  validationDetails: Record<string, unknown>;

  constructor(message: string, validationDetails: Record<string, unknown>) {
    super(message);
    this.validationDetails = validationDetails;
  }
}

export class MissingFieldsError extends Error {
  readonly missingFields: RequiredIngressField[];

  constructor(missingFields: RequiredIngressField[]) {
    super(`Missing fields for ingress: ${missingFields.join(', ')}`);
    this.missingFields = missingFields;
  }
}

export class InvalidFieldError extends Error {
  readonly field: RequiredIngressField;

  constructor(field: RequiredIngressField, reason: string) {
    super(`Invalid ${field} for ingress: ${reason}`);
    this.field = field;
  }
}

export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (parsed.success) {
    return parsed.data;
  }

  const details: Record<string, unknown> = parsed.error.flatten();
  const message = parsed.error.issues[0]?.message || 'Validation failed';
  throw new ValidationError(message, details);
}

/**
 * Pick the ingress fields out of raw relation data, dropping anything else the peer sent.
 */
export function pickRelationPayload(data: Record<string, string | undefined>): RelationPayload {
  const payload: RelationPayload = {};
  for (const field of INGRESS_FIELDS) {
    const value = data[field];
    if (value !== undefined) {
      payload[field] = value;
    }
  }
  return payload;
}

/**
 * Read a port sent as relation data. Anything but a whole number from 1 to 65535 yields undefined.
 */
export function parsePortText(value: string | undefined): number | undefined {
  if (value === undefined || !NUMERIC_REGEX.test(value)) {
    return undefined;
  }

  const port = Number(value);
  return port >= 1 && port <= MAX_PORT ? port : undefined;
}

export function findMissingFields(record: Partial<Record<RequiredIngressField, unknown>>): RequiredIngressField[] {
  return REQUIRED_INGRESS_RELATION_FIELDS.filter((field) => {
    const value = record[field];
    return value === undefined || value === null || value === '';
  }).sort();
}

export function checkRelationPayload(record: Partial<Record<RequiredIngressField, unknown>>): void {
  const missingFields = findMissingFields(record);
  if (missingFields.length > 0) {
    throw new MissingFieldsError(missingFields);
  }

  const port = record['service-port'];
  const validPort =
    typeof port === 'number'
      ? Number.isInteger(port) && port >= 1 && port <= MAX_PORT
      : typeof port === 'string' && parsePortText(port) !== undefined;
  if (!validPort) {
    throw new InvalidFieldError('service-port', `${JSON.stringify(port)} is not a port between 1 and ${MAX_PORT}`);
  }
}
