import type { TStatus, User } from '../types';

export const STATUS_GLYPHS: Record<TStatus, string> = {
  AVAILABLE: '●',
  DISCONNECTED: '○',
};

interface UserListProps {
  users: User[];
}

export const UserList = ({ users }: UserListProps) => (
  <section className="panel user-list">
    <div className="panel__header">
      <h2 className="panel__title">Users</h2>
      <span className="panel__count">{users.length}</span>
    </div>
    {users.length === 0 ? (
      <p className="panel__empty">No users online yet</p>
    ) : (
      <ul className="panel__rows">
        {users.map((user) => (
          <li key={user.rowId} className={`user-row user-row--${user.status.toLowerCase()}`}>
            <span className="user-row__status" aria-label={user.status}>
              {STATUS_GLYPHS[user.status]}
            </span>
            <span className="user-row__name">{user.lastName}</span>
          </li>
        ))}
      </ul>
    )}
  </section>
);
