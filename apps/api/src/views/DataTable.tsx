import { ResultSet, formatCell } from '../query/result-set';

type DataTableProps = {
  result: ResultSet;
};

export function DataTable({ result }: DataTableProps) {
  const { columns, rows } = result;
  if (rows.length === 0) {
    return <p className="muted">No rows returned.</p>;
  }
  return (
    <div className="table-wrap">
      <table>
        <thead>
          <tr>
            {columns.map((col, colIndex) => (
              <th key={`${col}-${colIndex}`}>{col}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={i}>
              {row.map((cell, colIndex) => (
                <td key={colIndex}>{formatCell(cell)}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
