import { Post, PostWithAuthor, PostChanges, PostStateChange } from '@/models';
import { PostState } from '@/constants/posts';

export interface PostListFilters {
  state?: PostState;
  search?: string;
  limit: number;
  offset: number;
}

export interface AuthorRow {
  id: string;
  firstName: string | null;
  lastName: string | null;
}

/**
 * Post Repository Interface
 */
export interface IPostRepository {
  /**
   * Non-deleted posts unless a state is given, newest first
   */
  listPosts(filters: PostListFilters): Promise<{ posts: PostWithAuthor[]; totalCount: number }>;

  listAuthors(): Promise<AuthorRow[]>;

  findFeaturedPost(): Promise<Post | null>;

  findPostById(postId: string): Promise<Post | null>;

  findPostByUrlName(urlName: string): Promise<Post | null>;

  /**
   * Posts whose url name is exactly urlName or starts with "urlName-"
   */
  countUrlNameUses(urlName: string): Promise<number>;

  createPost(post: { title: string; urlName: string; authorId: string }): Promise<Post>;

  updatePost(postId: string, changes: PostChanges): Promise<Post | null>;

  updatePostState(postId: string, change: PostStateChange): Promise<Post | null>;
}
