import type { ReactNode } from 'react';

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; background: #0f172a; color: #e2e8f0; }
main { max-width: 1100px; margin: 0 auto; padding: 32px 24px; }
h1 { font-size: 1.5rem; margin: 0 0 24px; }
textarea { width: 100%; min-height: 90px; box-sizing: border-box; padding: 12px; border-radius: 8px; border: 1px solid #334155; background: #1e293b; color: inherit; font: inherit; }
button, select { padding: 8px 16px; border-radius: 8px; border: 1px solid #334155; background: #4361ee; color: #fff; font: inherit; cursor: pointer; }
select { background: #1e293b; }
.notice { padding: 12px 16px; border-radius: 8px; margin: 16px 0; background: #1e293b; border-left: 4px solid #f59e0b; }
.error { border-left-color: #ef4444; }
pre { background: #1e293b; padding: 16px; border-radius: 8px; overflow-x: auto; }
.table-wrap { overflow-x: auto; }
table { width: 100%; border-collapse: collapse; font-size: 0.875rem; }
th { text-align: left; padding: 8px 12px; color: #94a3b8; border-bottom: 1px solid #334155; white-space: nowrap; }
td { padding: 8px 12px; border-bottom: 1px solid #1e293b; white-space: nowrap; }
.download { display: flex; gap: 8px; align-items: center; margin: 16px 0; }
.muted { color: #64748b; font-size: 0.875rem; }
`;

type LayoutProps = {
  title?: string;
  children: ReactNode;
};

export function Layout({ title = 'SQL Console', children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <main>
          <h1>SQL Console</h1>
          {children}
        </main>
      </body>
    </html>
  );
}
