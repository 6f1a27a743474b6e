import axios from 'axios';
import { TransportError } from '../errors';

/**
 * Very small wrapper around the Blogger v3 REST API – just the two calls the
 * bot needs.  HTTP error responses are rethrown as TransportError carrying the
 * status and raw body; network failures propagate unchanged.
 */
const BLOGGER_BASE_URL = 'https://www.googleapis.com/blogger/v3';
const REQUEST_TIMEOUT = 30_000;

export interface NewPost {
  title: string;
  content: string;
  labels?: string[];
}

export interface BlogPost {
  id?: string;
  url?: string;
}

export interface BlogInfo {
  id: string;
  name?: string;
  url?: string;
  posts?: { totalItems?: number };
}

export interface BlogApi {
  insertPost(accessToken: string, blogId: string, post: NewPost): Promise<BlogPost>;
  getBlog(accessToken: string, blogId: string): Promise<BlogInfo>;
}

function rethrowHttpError(err: unknown): never {
  if (axios.isAxiosError(err) && err.response) {
    const { status, data } = err.response;
    throw new TransportError(status, typeof data === 'string' ? data : JSON.stringify(data));
  }
  throw err;
}

export class BloggerRestApi implements BlogApi {
  constructor(private readonly baseUrl = BLOGGER_BASE_URL) {}

  async insertPost(accessToken: string, blogId: string, post: NewPost): Promise<BlogPost> {
    try {
      const { data } = await axios.post<BlogPost>(
        `${this.baseUrl}/blogs/${encodeURIComponent(blogId)}/posts/`,
        { kind: 'blogger#post', ...post },
        {
          headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
          timeout: REQUEST_TIMEOUT,
        },
      );
      return data;
    } catch (err) {
      rethrowHttpError(err);
    }
  }

  async getBlog(accessToken: string, blogId: string): Promise<BlogInfo> {
    try {
      const { data } = await axios.get<BlogInfo>(`${this.baseUrl}/blogs/${encodeURIComponent(blogId)}`, {
        headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
        timeout: REQUEST_TIMEOUT,
      });
      return data;
    } catch (err) {
      rethrowHttpError(err);
    }
  }
}
