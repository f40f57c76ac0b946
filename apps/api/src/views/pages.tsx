import { AnsweredQuestion } from '../query/query.service';
import { DataTable } from './DataTable';
import { DownloadForm } from './DownloadForm';
import { Layout } from './Layout';
import { QueryForm } from './QueryForm';

type HomePageProps = {
  question?: string;
  notice?: string;
};

export function HomePage({ question, notice }: HomePageProps) {
  return (
    <Layout>
      <QueryForm question={question} />
      {notice ? <p className="notice">{notice}</p> : null}
    </Layout>
  );
}

export function ResultPage({ question, sql, result }: AnsweredQuestion) {
  const count = result.rows.length;
  return (
    <Layout title="SQL Console – results">
      <QueryForm question={question} />
      <h2>Generated SQL</h2>
      <pre>
        <code>{sql}</code>
      </pre>
      <p className="muted">{`${count} ${count === 1 ? 'row' : 'rows'}`}</p>
      <DataTable result={result} />
      <DownloadForm sql={sql} />
    </Layout>
  );
}

type ErrorPageProps = {
  message: string;
  question?: string;
};

export function ErrorPage({ message, question }: ErrorPageProps) {
  return (
    <Layout title="SQL Console – error">
      <QueryForm question={question} />
      <p className="notice error" role="alert">
        {message}
      </p>
    </Layout>
  );
}
