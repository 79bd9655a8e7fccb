import React from 'react';
import type { Dispatch } from '../types';

interface PostFormProps {
  draftPost: string;
  dispatch: Dispatch;
}

export const PostForm = ({ draftPost, dispatch }: PostFormProps) => {
  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    dispatch({ type: 'SUBMIT_REQUESTED' });
  };

  return (
    <form className="post-form" onSubmit={handleSubmit}>
      <input
        type="text"
        placeholder="Write a post…"
        aria-label="New post"
        value={draftPost}
        onChange={(e) => dispatch({ type: 'DRAFT_CHANGED', text: e.target.value })}
        className="post-form__input"
      />
      <button type="submit" className="btn-primary">
        Post
      </button>
    </form>
  );
};
