import { Logger } from "../../config/logger";
import { DocumentLookup } from "../../matching/pinned-documents";
import { DocumentRef } from "../../shared/types/matching.types";
import { SupabaseRestClient } from "../supabase.client";

const BLOG_POSTS_TABLE = "blog_posts";
const BLOG_POST_COLUMNS = "id,url,title,author,published_date,featured_image";

export interface BlogPostRow {
  id: number | string;
  url: string;
  title?: string | null;
  author?: string | null;
  published_date?: string | null;
  featured_image?: string | null;
}

export class BlogPostsRepository implements DocumentLookup {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: SupabaseRestClient,
  ) {}

  async findByReferences(references: ReadonlyArray<string>): Promise<DocumentRef[]> {
    if (!this.supabaseClient || references.length === 0) {
      return [];
    }

    const urls = references.filter((item) => isUrl(item));
    const ids = references.filter((item) => !isUrl(item));
    const rows: BlogPostRow[] = [];
    if (urls.length) {
      rows.push(
        ...(await this.supabaseClient.selectMany<BlogPostRow>(BLOG_POSTS_TABLE, { url: { in: urls } }, BLOG_POST_COLUMNS)),
      );
    }
    if (ids.length) {
      rows.push(
        ...(await this.supabaseClient.selectMany<BlogPostRow>(BLOG_POSTS_TABLE, { id: { in: ids } }, BLOG_POST_COLUMNS)),
      );
    }

    this.logger.debug("Pinned blog posts resolved", {
      requested: references.length,
      found: rows.length,
    });
    return rows.map((row) => mapBlogPostRow(row));
  }
}

export function mapBlogPostRow(row: BlogPostRow): DocumentRef {
  return {
    id: String(row.id),
    title: row.title?.trim() || row.url,
    url: row.url,
    author: row.author?.trim() || undefined,
    publishedDate: row.published_date?.trim() || undefined,
    featuredImage: row.featured_image?.trim() || undefined,
  };
}

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}
