import { POST_RULES } from '@/config/businessRules';
import {
  Post,
  PostWithAuthor,
  PostChanges,
  PostStateChange,
  PostAuthor,
  PageMeta,
  buildPageMeta,
} from '@/models';
import { POST_STATES, PostState } from '@/constants/posts';
import { AppError, NotFoundError, OperationFailedError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IEventBus } from '@/events/EventBus';
import { IPostRepository } from '@/repositories/interfaces';
import { Debouncer } from '@/utils/debouncer';
import { formatPersonName } from '@/utils/names';
import { titleToUrlName, withUniqueSuffix } from '@/utils/slug';
import { isUniqueViolation } from '@/utils/pgErrors';

const logger = createLogger('PostService');

export const POST_SAVED_EVENT = 'post_saved';
const SAVE_FAILED_MESSAGE = 'Something went wrong try again.';

export function postSavedTopic(postId: string): string {
  return `${POST_SAVED_EVENT}:${postId}`;
}

export interface ListPostsParams {
  state?: PostState;
  search?: string;
  page: number;
  pageSize: number;
}

/**
 * Post Service
 * Blog post editing with debounced autosave and lifecycle transitions
 *
 * Autosave: edits are merged into a per-post change-set and persisted once
 * the post has been idle for AUTOSAVE_DEBOUNCE_MS. The outcome is published
 * on post_saved:<postId>.
 */
export class PostService {
  private pendingChanges = new Map<string, PostChanges>();
  private debouncer: Debouncer<string>;

  constructor(
    private postRepo: IPostRepository,
    private eventBus: IEventBus,
    debounceMs: number = POST_RULES.AUTOSAVE_DEBOUNCE_MS
  ) {
    this.debouncer = new Debouncer<string>(debounceMs, (postId, error) => {
      logger.error({ error, postId }, 'Autosave failed');
    });
  }

  async listPosts(params: ListPostsParams): Promise<{ posts: PostWithAuthor[]; meta: PageMeta }> {
    const { posts, totalCount } = await this.postRepo.listPosts({
      state: params.state,
      search: params.search,
      limit: params.pageSize,
      offset: (params.page - 1) * params.pageSize,
    });

    return { posts, meta: buildPageMeta(params.page, params.pageSize, totalCount) };
  }

  async listAuthors(): Promise<PostAuthor[]> {
    const authors = await this.postRepo.listAuthors();
    return authors.map((author) => ({
      id: author.id,
      name: formatPersonName(author.firstName, author.lastName),
    }));
  }

  async getFeaturedPost(): Promise<Post> {
    const post = await this.postRepo.findFeaturedPost();
    if (!post) {
      throw new NotFoundError('No featured post');
    }
    return post;
  }

  /**
   * Create a draft; the url name is derived from the title and made unique.
   * The use count only estimates the next free suffix (renames leave gaps,
   * concurrent creates race), so a taken name moves on to the next one.
   */
  async createPost(title: string, authorId: string): Promise<Post> {
    const baseUrlName = titleToUrlName(title);
    const uses = await this.postRepo.countUrlNameUses(baseUrlName);

    for (let attempt = 0; attempt < POST_RULES.MAX_URL_NAME_ATTEMPTS; attempt++) {
      const urlName = withUniqueSuffix(baseUrlName, uses + attempt);

      try {
        const post = await this.postRepo.createPost({ title, urlName, authorId });
        logger.info({ postId: post.id, urlName, authorId }, 'Post created');
        return post;
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }
        logger.warn({ urlName, attempt }, 'Post url name taken, trying the next suffix');
      }
    }

    throw new ValidationError('Invalid post data', {
      fieldErrors: { urlName: ['has already been taken'] },
    });
  }

  /**
   * Find a post by id, falling back to its url name
   */
  async getPost(idOrUrlName: string): Promise<Post> {
    const post =
      (await this.postRepo.findPostById(idOrUrlName)) ??
      (await this.postRepo.findPostByUrlName(idOrUrlName));

    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  /**
   * Queue changes for the debounced autosave
   */
  async autosavePost(postId: string, changes: PostChanges): Promise<{ saving: true }> {
    const post = await this.getStoredPost(postId);
    this.mergeChanges(post, changes);

    this.debouncer.schedule(postId, async () => {
      await this.persistPending(postId);
    });

    return { saving: true };
  }

  /**
   * Persist pending and given changes right away
   */
  async savePost(postId: string, changes: PostChanges): Promise<Post> {
    const post = await this.getStoredPost(postId);
    this.mergeChanges(post, changes);
    this.debouncer.cancel(postId);

    try {
      return await this.persistPending(postId);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('Invalid post data', {
          fieldErrors: { urlName: ['has already been taken'] },
        });
      }
      throw error;
    }
  }

  hasPendingAutosave(postId: string): boolean {
    return this.debouncer.pending(postId);
  }

  async publishPost(postId: string): Promise<{ post: Post; message: string }> {
    const post = await this.transition(postId, {
      state: POST_STATES.PUBLISHED,
      publishedOn: new Date(),
      deletedOn: null,
    });
    return { post, message: 'The post was published!' };
  }

  async restorePost(postId: string): Promise<{ post: Post; message: string }> {
    const post = await this.transition(postId, {
      state: POST_STATES.DRAFT,
      publishedOn: null,
      deletedOn: null,
      featuredPost: false,
    });
    return { post, message: 'The post recovered.' };
  }

  async deletePost(postId: string): Promise<{ post: Post; message: string }> {
    this.debouncer.cancel(postId);
    this.pendingChanges.delete(postId);

    const post = await this.transition(postId, {
      state: POST_STATES.DELETED,
      publishedOn: null,
      deletedOn: new Date(),
      featuredPost: false,
    });
    this.eventBus.forget(postSavedTopic(postId));
    return { post, message: 'The post was deleted.' };
  }

  /**
   * Persist every pending autosave (graceful shutdown)
   */
  async flushPendingAutosaves(): Promise<void> {
    for (const postId of [...this.pendingChanges.keys()]) {
      await this.debouncer.flush(postId).catch((error: unknown) => {
        logger.error({ error, postId }, 'Autosave failed during shutdown');
      });
    }
  }

  private async getStoredPost(postId: string): Promise<Post> {
    const post = await this.postRepo.findPostById(postId);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  /**
   * Last write wins per field; title and url name always travel with the
   * change-set so it stays valid on its own
   */
  private mergeChanges(post: Post, changes: PostChanges): void {
    const merged: PostChanges = { ...this.pendingChanges.get(post.id), ...changes };
    merged.title = merged.title ?? post.title;
    merged.urlName = merged.urlName ?? post.urlName;
    this.pendingChanges.set(post.id, merged);
  }

  private async persistPending(postId: string): Promise<Post> {
    const changes = this.pendingChanges.get(postId) ?? {};
    this.pendingChanges.delete(postId);
    const topic = postSavedTopic(postId);

    try {
      const post = await this.postRepo.updatePost(postId, changes);
      if (!post) {
        throw new NotFoundError('Post not found');
      }

      this.eventBus.publish(topic, POST_SAVED_EVENT, { post });
      logger.debug({ postId, fields: Object.keys(changes) }, 'Post saved');
      return post;
    } catch (error) {
      this.eventBus.publish(topic, POST_SAVED_EVENT, { error: SAVE_FAILED_MESSAGE });
      throw error;
    }
  }

  private async transition(postId: string, change: PostStateChange): Promise<Post> {
    let post: Post | null;
    try {
      post = await this.postRepo.updatePostState(postId, change);
    } catch (error) {
      if (error instanceof AppError) throw error;
      logger.error({ error, postId, state: change.state }, 'Post transition failed');
      throw new OperationFailedError(SAVE_FAILED_MESSAGE, error);
    }

    if (!post) {
      throw new NotFoundError('Post not found');
    }

    logger.info({ postId, state: change.state }, 'Post state changed');
    return post;
  }
}
