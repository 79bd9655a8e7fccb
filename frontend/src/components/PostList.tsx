import type { Post } from '../types';

interface PostListProps {
  posts: Post[];
}

export const PostList = ({ posts }: PostListProps) => (
  <section className="panel post-list">
    <div className="panel__header">
      <h2 className="panel__title">Posts</h2>
      <span className="panel__count">{posts.length}</span>
    </div>
    {posts.length === 0 ? (
      <p className="panel__empty">No posts yet</p>
    ) : (
      <ul className="panel__rows">
        {/* posts carry no id; feed order is stable within a snapshot */}
        {posts.map((post, i) => (
          <li key={i} className="post-row">
            <span className="post-row__author">{post.authorName}</span>
            <p className="post-row__content">{post.content}</p>
            <time className="post-row__date">{post.date}</time>
          </li>
        ))}
      </ul>
    )}
  </section>
);
