/**
 * Field Validator Exports
 * Pure functions, one raw value in, FieldCheck out
 */

export {
  validateGenericUrl,
  validateGithubUrl,
  validateLinkedinUrl,
} from './url.validator.js';
export { validatePassword } from './password.validator.js';
export { validateNickname } from './nickname.validator.js';
export { validateEmail } from './email.validator.js';
export { parseRole } from './role.validator.js';
