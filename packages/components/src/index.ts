export {
  TextInputField,
  type TextInputFieldOptions,
  type TextInputState,
} from './TextInputField.js';
export {
  textInputComponentSchema,
  parseTextInputComponent,
  type TextInputComponentData,
} from './schemas.js';
export {
  applyModalSubmission,
  collectFieldValues,
  type ModalSubmissionSource,
} from './modalSubmission.js';
