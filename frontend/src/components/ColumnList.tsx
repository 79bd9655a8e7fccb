import type { Column } from '../types';

interface ColumnListProps {
  columns: Column[];
}

export const ColumnList = ({ columns }: ColumnListProps) => (
  <section className="panel column-list">
    <div className="panel__header">
      <h2 className="panel__title">Columns</h2>
      <span className="panel__count">{columns.length}</span>
    </div>
    {columns.length === 0 ? (
      <p className="panel__empty">No columns yet</p>
    ) : (
      <ul className="panel__rows">
        {columns.map((column, i) => (
          <li key={`${column.name}-${i}`} className="column-row">
            <span className="column-row__name">{column.name}</span>
            <time className="column-row__date">{column.date}</time>
          </li>
        ))}
      </ul>
    )}
  </section>
);
