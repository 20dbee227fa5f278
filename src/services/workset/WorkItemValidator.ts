import { z } from 'zod';
import { WorkItem } from '../../types/EnrichmentTypes';
import { ItemProcessingFault } from '../../types/EnrichmentErrors';

export const INCHIKEY_PATTERN = /^[A-Z]{14}-[A-Z]{10}-[A-Z]$/;

const WorkItemSchema = z.object({
  key: z
    .string()
    .refine((key) => key.trim() !== '', { message: 'key is empty' })
    .refine((key) => !/[\r\n]/.test(key), { message: 'key contains a line break' }),
  label: z.string(),
  synonyms: z.array(z.string()),
});

export interface ValidatedWorkItem {
  item: WorkItem;
  /** hints dropped because they cannot be used for lookups */
  droppedHints: string[];
}

/**
 * Throws ItemProcessingFault when the item cannot be written or looked up at all.
 * A secondary key that is not an InChIKey is dropped; name lookups still run.
 */
export function validateWorkItem(item: WorkItem): ValidatedWorkItem {
  const parsed = WorkItemSchema.safeParse(item);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ItemProcessingFault(item.key, `Malformed work item: ${details}`);
  }

  if (item.secondaryKey === undefined || INCHIKEY_PATTERN.test(item.secondaryKey)) {
    return { item, droppedHints: [] };
  }
  const { secondaryKey, ...rest } = item;
  return {
    item: Object.freeze(rest),
    droppedHints: [`secondary key is not an InChIKey: ${secondaryKey}`],
  };
}
