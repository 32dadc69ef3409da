// src/core/auth/callbackPages.ts

const STYLE = `
  body { font-family: system-ui, sans-serif; max-width: 560px; margin: 60px auto; padding: 20px; color: #222; }
  h1 { font-size: 1.5em; }
  .error { background: #fee; border: 1px solid #fcc; padding: 12px; border-radius: 8px; color: #c33; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
${body}
</body>
</html>`;
}

export function renderSuccessPage(): string {
  return layout(
    'Authentication Successful',
    `  <h1>Authentication Successful!</h1>
  <p>You can close this window and return to the application.</p>
  <script>window.close();</script>`
  );
}

export function renderErrorPage(message: string, description?: string): string {
  const detail = description ? `\n  <p>${escapeHtml(description)}</p>` : '';
  return layout(
    'Authentication Failed',
    `  <h1>Authentication Failed</h1>
  <div class="error">Error: ${escapeHtml(message)}</div>${detail}
  <p>You can close this window.</p>`
  );
}
