export {
  TemplateService,
  EMPTY_PREVIEW_NOTICE,
  VALIDATION_OK_MESSAGE,
  type TemplateServiceOptions,
  type PreviewResponse,
  type ValidateResponse,
  type SuppliedValues,
} from "./template-service.js";
