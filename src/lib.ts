// Public API
export * from './types/compliance';
export {
  validateTitle,
  isValidType,
  VALID_TYPES,
  SUMMARY_MIN_LENGTH,
  SUMMARY_MAX_LENGTH,
  TITLE_FORMAT
} from './utils/titleValidator';
export { extractLinks, extractAllUrls } from './utils/linkExtractor';
export { ComplianceService, complianceService } from './services/complianceService';
export { buildComplianceBlocks } from './slack/blocks';
export { AppError, ValidationError } from './utils/errors';
