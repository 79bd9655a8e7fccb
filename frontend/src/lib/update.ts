import type { Effect, Model, Msg } from '../types';

export const initialModel: Model = { users: [], posts: [], columns: [], draftPost: '' };

/**
 * The single state transition. Feed events replace their list wholesale;
 * events that change nothing return the very same model object.
 */
export function update(msg: Msg, model: Model): [Model, Effect[]] {
  switch (msg.type) {
    case 'USERS_RECEIVED':
      return [{ ...model, users: msg.users }, []];

    case 'POSTS_RECEIVED':
      return [{ ...model, posts: msg.posts }, []];

    case 'COLUMNS_RECEIVED':
      return [{ ...model, columns: msg.columns }, []];

    case 'DRAFT_CHANGED':
      return [{ ...model, draftPost: msg.text }, []];

    case 'SUBMIT_REQUESTED': {
      // only the exact empty string is rejected; whitespace is content
      if (model.draftPost === '') return [model, []];
      return [{ ...model, draftPost: '' }, [{ type: 'SEND_POST', content: model.draftPost }]];
    }

    case 'DECODE_FAILED':
      return [model, [{ type: 'LOG_ERROR', message: `Dropped ${msg.error.feed} update: ${msg.error.message}` }]];

    case 'SUBMIT_COMPLETED':
      return [model, []];
  }
}
