import type { Text } from '../../domain/models/text.model';

/** GET /texts/:id also reports the attached tags. */
export interface TextWithTags extends Text {
  tagIds: string[];
}
