// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { FeedView } from './FeedView';
import { initialModel } from '../lib/update';
import type { Model } from '../types';

const model: Model = {
  users: [
    { firstName: 'Ada', lastName: 'Lovelace', status: 'AVAILABLE', rowId: 1 },
    { firstName: 'Alan', lastName: 'Turing', status: 'DISCONNECTED', rowId: 2 },
  ],
  posts: [
    { authorName: 'Grace', content: 'second', date: '2024-05-02' },
    { authorName: 'Ada', content: 'first', date: '2024-05-01' },
  ],
  columns: [{ name: 'Backlog', date: '2024-04-30' }],
  draftPost: 'draft in progress',
};

afterEach(cleanup);

describe('FeedView', () => {
  it('renders the same markup for the same model', () => {
    const first = render(<FeedView model={model} dispatch={vi.fn()} />).container.innerHTML;
    cleanup();
    const second = render(<FeedView model={model} dispatch={vi.fn()} />).container.innerHTML;

    expect(second).toBe(first);
  });

  it('shows the available glyph for an available user', () => {
    render(<FeedView model={{ ...initialModel, users: [model.users[0]] }} dispatch={vi.fn()} />);

    expect(screen.getByLabelText('AVAILABLE').textContent).toBe('●');
    expect(screen.queryByText('○')).toBeNull();
    expect(screen.getByText('Lovelace')).toBeTruthy();
  });

  it('shows the disconnected glyph followed by the last name', () => {
    const { container } = render(<FeedView model={model} dispatch={vi.fn()} />);

    const rows = Array.from(container.querySelectorAll('.user-row'), (row) => row.textContent);
    expect(rows).toEqual(['●Lovelace', '○Turing']);
  });

  it('lists posts and columns in model order', () => {
    const { container } = render(<FeedView model={model} dispatch={vi.fn()} />);

    const posts = Array.from(container.querySelectorAll('.post-row'), (row) => [
      row.querySelector('.post-row__author')?.textContent,
      row.querySelector('.post-row__content')?.textContent,
      row.querySelector('.post-row__date')?.textContent,
    ]);
    expect(posts).toEqual([
      ['Grace', 'second', '2024-05-02'],
      ['Ada', 'first', '2024-05-01'],
    ]);

    const columns = Array.from(container.querySelectorAll('.column-row'), (row) => row.textContent);
    expect(columns).toEqual(['Backlog2024-04-30']);
  });

  it('binds the post input to the draft', () => {
    render(<FeedView model={model} dispatch={vi.fn()} />);

    const input = screen.getByLabelText('New post');
    if (!(input instanceof HTMLInputElement)) throw new Error('post field is not an input');
    expect(input.value).toBe('draft in progress');
  });

  it('raises DRAFT_CHANGED while typing and SUBMIT_REQUESTED on submit', () => {
    const dispatch = vi.fn();
    render(<FeedView model={initialModel} dispatch={dispatch} />);

    const input = screen.getByLabelText('New post');
    const form = input.closest('form');
    if (!form) throw new Error('post field is outside a form');
    fireEvent.change(input, { target: { value: 'hello' } });
    fireEvent.submit(form);

    expect(dispatch.mock.calls).toEqual([[{ type: 'DRAFT_CHANGED', text: 'hello' }], [{ type: 'SUBMIT_REQUESTED' }]]);
  });

  it('posts the column form straight to the host', () => {
    const dispatch = vi.fn();
    const { container } = render(<FeedView model={initialModel} dispatch={dispatch} />);

    const form = container.querySelector('form.column-form');
    expect(form?.getAttribute('method')).toBe('post');
    expect(form?.getAttribute('action')).toBe('http://localhost:3001/add-column');
    expect(screen.getByLabelText('Column name').getAttribute('name')).toBe('columnName');
  });

  it('shows empty states for empty lists', () => {
    render(<FeedView model={initialModel} dispatch={vi.fn()} />);

    expect(screen.getByText('No users online yet')).toBeTruthy();
    expect(screen.getByText('No posts yet')).toBeTruthy();
    expect(screen.getByText('No columns yet')).toBeTruthy();
  });
});
