type DownloadFormProps = {
  sql: string;
};

export function DownloadForm({ sql }: DownloadFormProps) {
  return (
    <form method="post" action="/download" className="download">
      <input type="hidden" name="sql" value={sql} />
      <select name="format" defaultValue="csv" aria-label="File format">
        <option value="csv">CSV</option>
        <option value="xlsx">Excel (.xlsx)</option>
      </select>
      <button type="submit">Download</button>
    </form>
  );
}
