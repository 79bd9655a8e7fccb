import { API_URL } from '../config';

// Plain form post; the host redirects back once the column is stored.
export const ColumnForm = () => (
  <form className="column-form" method="post" action={`${API_URL}/add-column`}>
    <label htmlFor="columnName" className="column-form__label">
      Column name
    </label>
    <input id="columnName" name="columnName" type="text" className="column-form__input" />
    <button type="submit" className="btn-sm">
      Add Column
    </button>
  </form>
);
