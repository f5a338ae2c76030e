/**
 * responses.ts
 *
 * JSON shapes of the SEP-12 responses. Absent values are omitted, never sent as null.
 */

import type {
  CustomerField,
  CustomerFieldType,
  CustomerStatus,
  GetCustomerResponse,
  ProvidedCustomerField,
  ProvidedCustomerFieldStatus,
  PutCustomerResponse,
} from './types';

export const CUSTOMER_STATUS = {
  ACCEPTED: 'ACCEPTED',
  PROCESSING: 'PROCESSING',
  NEEDS_INFO: 'NEEDS_INFO',
  REJECTED: 'REJECTED',
} as const satisfies Record<string, CustomerStatus>;

export const PROVIDED_FIELD_STATUS = {
  ACCEPTED: 'ACCEPTED',
  PROCESSING: 'PROCESSING',
  REJECTED: 'REJECTED',
  VERIFICATION_REQUIRED: 'VERIFICATION_REQUIRED',
} as const satisfies Record<string, ProvidedCustomerFieldStatus>;

export const CUSTOMER_FIELD_TYPE = {
  STRING: 'string',
  BINARY: 'binary',
  NUMBER: 'number',
  DATE: 'date',
} as const satisfies Record<string, CustomerFieldType>;

type Json = Record<string, unknown>;

function fieldBody(field: CustomerField): Json {
  const body: Json = { type: field.type, description: field.description };
  if (field.choices !== undefined) {
    body.choices = field.choices;
  }
  if (field.optional) {
    body.optional = true;
  }
  return body;
}

export function customerFieldToJson(field: CustomerField): Json {
  return { [field.fieldName]: fieldBody(field) };
}

export function providedCustomerFieldToJson(field: ProvidedCustomerField): Json {
  const body = fieldBody(field);
  if (field.status !== undefined) {
    body.status = field.status;
  }
  if (field.error !== undefined) {
    body.error = field.error;
  }
  return { [field.fieldName]: body };
}

export function getCustomerResponseToJson(response: GetCustomerResponse): Json {
  const json: Json = {};
  if (response.id !== undefined) {
    json.id = response.id;
  }
  json.status = response.status;
  if (response.message !== undefined) {
    json.message = response.message;
  }
  if (response.fields !== undefined) {
    json.fields = Object.assign({}, ...response.fields.map(customerFieldToJson));
  }
  if (response.providedFields !== undefined) {
    json.provided_fields = Object.assign({}, ...response.providedFields.map(providedCustomerFieldToJson));
  }
  return json;
}

export function putCustomerResponseToJson(response: PutCustomerResponse): Json {
  return { id: response.id };
}
