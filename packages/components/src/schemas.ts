/**
 * Text Input Wire Schemas
 *
 * Zod schemas for the text input component record exchanged with Discord.
 * Only the shape is checked here; Discord's length bounds are enforced by
 * TextInputField so that they surface as ValidationError.
 */

import { ComponentType, TextInputStyle } from 'discord.js';
import { z } from 'zod';

/**
 * Text input component record (type 4)
 */
export const textInputComponentSchema = z.object({
  type: z.literal(ComponentType.TextInput),
  style: z.nativeEnum(TextInputStyle),
  custom_id: z.string(),
  label: z.string(),
  placeholder: z.string().optional(),
  min_length: z.number().int().optional(),
  max_length: z.number().int().optional(),
  required: z.boolean().optional(),
  value: z.string().optional(),
  /** Numeric component id, assigned by Discord when omitted */
  id: z.number().int().optional(),
});

export type TextInputComponentData = z.infer<typeof textInputComponentSchema>;

/**
 * Parse an untrusted record into text input component data.
 * @throws TypeError listing every shape mismatch
 */
export function parseTextInputComponent(data: unknown): TextInputComponentData {
  const result = textInputComponentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TypeError(`Invalid text input component: ${issues}`);
  }
  return result.data;
}
