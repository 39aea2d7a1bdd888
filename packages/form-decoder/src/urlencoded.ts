import {collapseValues, groupValues} from './collapse';
import type {FieldValue} from './contracts';

/**
 * Parses `application/x-www-form-urlencoded` text. Keys and values are
 * percent-decoded, `+` reads as a space and blank values are kept.
 */
export const parseUrlEncoded = (text: string): Record<string, FieldValue> => {
  const source = text.startsWith('?') ? text.slice(1) : text;
  return collapseValues(groupValues(new URLSearchParams(source)));
};
