import { query } from '@/config/database';
import { Post, PostWithAuthor, PostChanges, PostStateChange } from '@/models';
import { POST_STATES } from '@/constants/posts';
import { escapeLikePattern } from '@/utils/slug';
import { ulid } from 'ulid';
import { IPostRepository, PostListFilters, AuthorRow } from './interfaces/IPostRepository';

const POST_COLUMNS = `
  p.id,
  p.title,
  p.url_name AS "urlName",
  p.preview_text AS "previewText",
  p.body,
  p.raw_body AS "rawBody",
  p.image_id AS "imageId",
  p.state,
  p.featured_post AS "featuredPost",
  p.published_on AS "publishedOn",
  p.deleted_on AS "deletedOn",
  p.author_id AS "authorId",
  p.inserted_at AS "insertedAt",
  p.updated_at AS "updatedAt"
`;

const CHANGE_COLUMNS = [
  ['title', 'title'],
  ['urlName', 'url_name'],
  ['previewText', 'preview_text'],
  ['body', 'body'],
  ['rawBody', 'raw_body'],
  ['imageId', 'image_id'],
  ['featuredPost', 'featured_post'],
] as const;

/**
 * Post Repository
 * Handles all database operations for blog posts
 */
export class PostRepository implements IPostRepository {
  async listPosts(
    filters: PostListFilters
  ): Promise<{ posts: PostWithAuthor[]; totalCount: number }> {
    const params: unknown[] = [];
    const conditions: string[] = [];

    if (filters.state) {
      params.push(filters.state);
      conditions.push(`p.state = $${params.length}`);
    } else {
      params.push(POST_STATES.DELETED);
      conditions.push(`p.state <> $${params.length}`);
    }

    if (filters.search) {
      params.push(`%${escapeLikePattern(filters.search)}%`);
      conditions.push(`p.title ILIKE $${params.length}`);
    }

    const where = `WHERE ${conditions.join(' AND ')}`;

    const countResult = await query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM posts p ${where}`,
      params
    );

    const result = await query<PostWithAuthor>(
      `
      SELECT
        ${POST_COLUMNS},
        u.first_name AS "authorFirstName",
        u.last_name AS "authorLastName"
      FROM posts p
      LEFT JOIN users u ON u.id = p.author_id
      ${where}
      ORDER BY p.inserted_at DESC, p.id DESC
      LIMIT $${params.length + 1} OFFSET $${params.length + 2}
      `,
      [...params, filters.limit, filters.offset]
    );

    return {
      posts: result.rows,
      totalCount: countResult.rows[0]?.count ?? 0,
    };
  }

  async listAuthors(): Promise<AuthorRow[]> {
    const result = await query<AuthorRow>(
      `
      SELECT DISTINCT
        u.id,
        u.first_name AS "firstName",
        u.last_name AS "lastName"
      FROM posts p
      JOIN users u ON u.id = p.author_id
      ORDER BY "firstName", "lastName"
      `
    );

    return result.rows;
  }

  async findFeaturedPost(): Promise<Post | null> {
    const result = await query<Post>(
      `
      SELECT ${POST_COLUMNS}
      FROM posts p
      WHERE p.state = $1 AND p.featured_post = true
      ORDER BY p.published_on DESC NULLS LAST, p.inserted_at DESC
      LIMIT 1
      `,
      [POST_STATES.PUBLISHED]
    );

    return result.rows[0] ?? null;
  }

  async findPostById(postId: string): Promise<Post | null> {
    const result = await query<Post>(`SELECT ${POST_COLUMNS} FROM posts p WHERE p.id = $1`, [
      postId,
    ]);

    return result.rows[0] ?? null;
  }

  async findPostByUrlName(urlName: string): Promise<Post | null> {
    const result = await query<Post>(
      `SELECT ${POST_COLUMNS} FROM posts p WHERE p.url_name = $1`,
      [urlName]
    );

    return result.rows[0] ?? null;
  }

  async countUrlNameUses(urlName: string): Promise<number> {
    const result = await query<{ count: number }>(
      `
      SELECT COUNT(*)::int AS count
      FROM posts
      WHERE url_name = $1 OR url_name ILIKE $2
      `,
      [urlName, `${escapeLikePattern(urlName)}-%`]
    );

    return result.rows[0]?.count ?? 0;
  }

  async createPost(post: { title: string; urlName: string; authorId: string }): Promise<Post> {
    const result = await query<Post>(
      `
      INSERT INTO posts AS p (id, title, url_name, state, featured_post, author_id, inserted_at, updated_at)
      VALUES ($1, $2, $3, $4, false, $5, NOW(), NOW())
      RETURNING ${POST_COLUMNS}
      `,
      [ulid(), post.title, post.urlName, POST_STATES.DRAFT, post.authorId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to insert post');
    }
    return row;
  }

  async updatePost(postId: string, changes: PostChanges): Promise<Post | null> {
    const params: unknown[] = [postId];
    const assignments: string[] = ['updated_at = NOW()'];

    for (const [key, column] of CHANGE_COLUMNS) {
      const value = changes[key];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    const result = await query<Post>(
      `UPDATE posts p SET ${assignments.join(', ')} WHERE p.id = $1 RETURNING ${POST_COLUMNS}`,
      params
    );

    return result.rows[0] ?? null;
  }

  async updatePostState(postId: string, change: PostStateChange): Promise<Post | null> {
    const result = await query<Post>(
      `
      UPDATE posts p
      SET state = $2,
          published_on = $3,
          deleted_on = $4,
          featured_post = COALESCE($5, p.featured_post),
          updated_at = NOW()
      WHERE p.id = $1
      RETURNING ${POST_COLUMNS}
      `,
      [postId, change.state, change.publishedOn, change.deletedOn, change.featuredPost ?? null]
    );

    return result.rows[0] ?? null;
  }
}
