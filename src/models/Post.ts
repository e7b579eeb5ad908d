import { PostState } from '@/constants/posts';

/**
 * Post model
 * Matches the 'posts' table
 */
export interface Post {
  id: string;
  title: string;
  urlName: string;
  previewText: string | null;
  body: string | null;
  rawBody: string | null;
  imageId: string | null;
  state: PostState;
  featuredPost: boolean;
  publishedOn: Date | null;
  deletedOn: Date | null;
  authorId: string;
  insertedAt: Date;
  updatedAt: Date;
}

export interface PostWithAuthor extends Post {
  authorFirstName: string | null;
  authorLastName: string | null;
}

/**
 * Attributes the editor may change; a pending autosave holds a partial set
 */
export interface PostChanges {
  title?: string;
  urlName?: string;
  previewText?: string | null;
  body?: string | null;
  rawBody?: string | null;
  imageId?: string | null;
  featuredPost?: boolean;
}

/**
 * Columns written by a lifecycle transition (publish, delete, restore)
 */
export interface PostStateChange {
  state: PostState;
  publishedOn: Date | null;
  deletedOn: Date | null;
  featuredPost?: boolean;
}

export interface PostAuthor {
  id: string;
  name: string;
}
