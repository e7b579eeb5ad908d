/**
 * Post lifecycle states
 */
export const POST_STATES = {
  DRAFT: 'draft',
  PUBLISHED: 'published',
  DELETED: 'deleted',
} as const;

export type PostState = (typeof POST_STATES)[keyof typeof POST_STATES];

export const POST_STATE_VALUES = Object.values(POST_STATES);
