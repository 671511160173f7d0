import { ValidationError } from '../../utils/errors';
import { isDigits, isEmailAddress, isNonEmptyString, isValidUrl } from '../../utils/validation';
import { Receiver } from './types';

export const MAX_SHORT_NAME_LENGTH = 12;

/**
 * Check a single receiver. Returns the problems found; an empty list means the
 * receiver is usable. `path` prefixes the field of each issue.
 */
export function validateReceiver(receiver: Receiver, path: string): ValidationError[] {
  const issues: ValidationError[] = [];

  if (!isNonEmptyString(receiver.name)) {
    issues.push(new ValidationError('Receiver name must be a non-empty string', `${path}.name`));
  }

  switch (receiver.kind) {
    case 'email':
      if (!isNonEmptyString(receiver.address)) {
        issues.push(new ValidationError('Email address must not be empty', `${path}.address`));
      } else if (!isEmailAddress(receiver.address)) {
        issues.push(new ValidationError(`Invalid email address "${receiver.address}"`, `${path}.address`));
      }
      break;
    case 'sms':
      if (!isDigits(receiver.countryCode)) {
        issues.push(new ValidationError('Country code must contain digits only', `${path}.countryCode`));
      }
      if (!isDigits(receiver.number)) {
        issues.push(new ValidationError('Phone number must contain digits only', `${path}.number`));
      }
      break;
    case 'webhook':
      if (!isValidUrl(receiver.uri)) {
        issues.push(new ValidationError('Webhook URI must be an absolute HTTP or HTTPS URL', `${path}.uri`));
      }
      break;
    case 'role':
      if (!isNonEmptyString(receiver.roleId)) {
        issues.push(new ValidationError('Role id must not be empty', `${path}.roleId`));
      }
      break;
  }

  return issues;
}

/**
 * Identity of a receiver's destination. Two receivers with the same key are
 * the same recipient, whatever group or display name they came from.
 */
export function receiverKey(receiver: Receiver): string {
  switch (receiver.kind) {
    case 'email':
      return `email:${receiver.address.trim().toLowerCase()}`;
    case 'sms':
      return `sms:+${receiver.countryCode}${receiver.number}`;
    case 'webhook':
      return `webhook:${receiver.uri.trim()}`;
    case 'role':
      return `role:${receiver.roleId.trim()}`;
  }
}
