const STYLE = `
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;
    display: flex;
    justify-content: center;
    align-items: center;
    height: 100vh;
    margin: 0;
    background: #1a1a2e;
  }
  .card {
    background: #fff;
    padding: 3rem;
    border-radius: 1rem;
    box-shadow: 0 20px 60px rgba(0,0,0,0.3);
    text-align: center;
    max-width: 400px;
  }
  h1 { color: #2d3748; margin-bottom: 1rem; font-size: 1.875rem; }
  p { color: #4a5568; line-height: 1.6; }
  .icon { font-size: 4rem; margin-bottom: 1rem; }
  .ok { color: #00d474; }
  .fail { color: #ff4757; }
`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function page(title: string, icon: string, iconClass: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
<style>${STYLE}</style>
</head>
<body>
  <div class="card">
    <div class="icon ${iconClass}">${icon}</div>
    <h1>${title}</h1>
    <p>${message}</p>
  </div>
</body>
</html>`;
}

export function getSuccessHTML(): string {
  return page(
    'Authorization Successful',
    '&#10003;',
    'ok',
    'You have authorized the application. You can close this window and return to your terminal.',
  );
}

export function getErrorHTML(message: string): string {
  return page('Authorization Failed', '&#10007;', 'fail', escapeHtml(message));
}

export function getNotFoundHTML(): string {
  return page('Not Found', '?', 'fail', 'This address only accepts the authorization redirect.');
}
