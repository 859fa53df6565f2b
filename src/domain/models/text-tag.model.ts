/** Tag that can be attached to any number of texts. `name` is unique. */
export interface TextTag {
  id: string;
  name: string;
  description: string | null;
}

export interface TextTagDraft {
  id?: string;
  name: string;
  description?: string | null;
}

export type TextTagReplacement = Pick<TextTag, 'name' | 'description'>;

/** Many-to-many junction between texts and tags. */
export interface TextTagAssociation {
  textId: string;
  tagId: string;
}
