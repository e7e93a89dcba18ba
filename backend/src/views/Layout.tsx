import type { ReactNode } from "react";

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; background: #f6f7f9; color: #1d2330; }
  main { max-width: 1100px; margin: 0 auto; padding: 24px; }
  h1 { font-size: 1.5rem; margin: 0 0 4px; }
  .card { background: #fff; border: 1px solid #dde1e7; border-radius: 12px; margin: 16px 0; }
  .card-header { padding: 12px 16px; border-bottom: 1px solid #dde1e7; }
  .card-title { font-size: 1rem; font-weight: 600; margin: 0; }
  .card-content { padding: 16px; }
  .banner { border: 1px solid; border-radius: 10px; padding: 10px 14px; margin: 8px 0; font-size: 0.9rem; }
  .banner-error { border-color: #c23b3b; color: #8f1f1f; background: #fdf1f1; }
  .banner-warning { border-color: #c48a1a; color: #70500f; background: #fdf7ea; }
  .banner-info { border-color: #3b6fc2; color: #1f438f; background: #eef3fd; }
  .banner-success { border-color: #2e8a4f; color: #1b5a32; background: #eefaf2; }
  textarea, input[type=text], input[type=url], select { width: 100%; box-sizing: border-box; border: 1px solid #c9ced6; border-radius: 8px; padding: 8px; font: inherit; }
  textarea { min-height: 80px; resize: vertical; }
  textarea.tall { min-height: 360px; font-family: ui-monospace, monospace; font-size: 0.85rem; }
  label { display: block; font-size: 0.85rem; margin: 10px 0 4px; }
  button { border: 0; border-radius: 8px; padding: 8px 14px; background: #2f5bd3; color: #fff; font: inherit; cursor: pointer; }
  button.secondary { background: #e3e7ee; color: #1d2330; }
  .row { display: flex; gap: 8px; align-items: flex-end; }
  .row > .grow { flex: 1; }
  .actions { display: flex; gap: 8px; margin-top: 12px; }
  .badge { display: inline-block; font-size: 0.7rem; border-radius: 999px; padding: 1px 8px; margin-left: 6px; }
  .badge-fetched { background: #eef3fd; color: #1f438f; }
  .badge-manual { background: #e3e7ee; color: #1d2330; }
  code { background: #eef0f4; border-radius: 4px; padding: 0 4px; }
  .table { width: 100%; border-collapse: collapse; font-size: 0.85rem; }
  .cell { border-bottom: 1px solid #dde1e7; padding: 8px; text-align: left; vertical-align: top; }
  pre { white-space: pre-wrap; margin: 0; font-size: 0.8rem; }
`;

export interface LayoutProps {
  title: string;
  children: ReactNode;
}

export function Layout({ title, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <main>{children}</main>
      </body>
    </html>
  );
}
