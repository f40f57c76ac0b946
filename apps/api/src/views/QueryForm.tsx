type QueryFormProps = {
  question?: string;
};

export function QueryForm({ question = '' }: QueryFormProps) {
  return (
    <form method="post" action="/query">
      <label htmlFor="question">Ask a question about the data</label>
      <textarea
        id="question"
        name="question"
        placeholder="e.g. list the first 5 customers"
        defaultValue={question}
      />
      <button type="submit">Run</button>
    </form>
  );
}
