import { UserSummary } from './user.model';

export const POST_CATEGORIES = ['general', 'announcement', 'question'] as const;
export type PostCategory = (typeof POST_CATEGORIES)[number];

export const POST_MAX_LENGTH = 280;
export const COMMENT_MAX_LENGTH = 200;
export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png'] as const;

export interface Post {
  id: number;
  content: string;
  authorId: number;
  createdAt: Date;
  updatedAt: Date;
  imageUrl: string | null;
  category: PostCategory;
  isActive: boolean;
  likeCount: number;
  commentCount: number;
}

export interface PostWithAuthor extends Post {
  author: UserSummary;
}

export interface PostCreationAttributes {
  authorId: number;
  content: string;
  imageUrl?: string | null;
  category?: PostCategory;
}

export interface PostUpdateAttributes {
  content?: string;
  imageUrl?: string | null;
  category?: PostCategory;
}

export interface Comment {
  id: number;
  content: string;
  authorId: number;
  postId: number;
  createdAt: Date;
  isActive: boolean;
}

export interface CommentWithAuthor extends Comment {
  author: UserSummary;
}

export interface Like {
  id: number;
  userId: number;
  postId: number;
  createdAt: Date;
}

export interface PostImage {
  id: number;
  postId: number;
  imageUrl: string;
  uploadedAt: Date;
}

/** Post as returned to the requesting user. */
export interface PostView extends PostWithAuthor {
  isLiked: boolean;
  isAuthor: boolean;
}

export interface PostDetailView extends PostView {
  comments: CommentWithAuthor[];
  images: PostImage[];
}

export interface PostQuery {
  category?: string;
  author?: string;
  search?: string;
}

export interface AdminPostQuery {
  category?: string;
  status?: 'active' | 'inactive';
}
