export type SectionId = string;

/** The permanent default section. Created with the store, never deleted. */
export const DEFAULT_SECTION_ID: SectionId = 'inbox';
export const DEFAULT_SECTION_TITLE = 'Inbox';

export interface Section {
  readonly id: SectionId;
  readonly title: string;
  /** Creation order; lowest first */
  readonly sortOrder: number;
}
