/**
 * Modal Submission Helpers
 *
 * Relay the values of a modal submission into the TextInputFields that built
 * the modal.
 */

import { createLogger } from '@modal-kit/common-types';
import type { TextInputField } from './TextInputField.js';

const logger = createLogger('modal-submission');

/**
 * The part of a modal submission these helpers read.
 * A discord.js ModalSubmitInteraction satisfies it.
 */
export interface ModalSubmissionSource {
  fields: { getTextInputValue: (customId: string) => string };
}

/**
 * Ingest submitted values into the matching fields.
 *
 * Fields the submission does not contain are left untouched.
 *
 * @returns Number of fields that received a value
 */
export function applyModalSubmission(
  interaction: ModalSubmissionSource,
  fields: readonly TextInputField[]
): number {
  let refreshed = 0;

  for (const field of fields) {
    let value: string;
    try {
      value = interaction.fields.getTextInputValue(field.customId);
    } catch (error) {
      // discord.js throws when the submission has no component with this id
      logger.debug({ err: error, customId: field.customId }, 'Field missing from submission');
      continue;
    }

    field.refreshState({ value });
    refreshed++;
  }

  return refreshed;
}

/**
 * Current value of each field, keyed by custom id
 */
export function collectFieldValues(
  fields: readonly TextInputField[]
): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {};

  for (const field of fields) {
    values[field.customId] = field.value;
  }

  return values;
}
