export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

const ERROR_MESSAGES: Record<string, string> = {
  access_denied: 'Access to Google Drive was denied.',
  missing_parameters: 'The sign-in response was incomplete. Please try again.',
  invalid_session: 'Your session expired. Please sign in again.',
  state_mismatch: 'The sign-in response did not match this session. Please try again.',
  token_exchange_failed: 'Google did not accept the sign-in. Please try again.',
};

export function describeLoginError(code: string): string {
  const known = Object.prototype.hasOwnProperty.call(ERROR_MESSAGES, code) ? ERROR_MESSAGES[code] : undefined;
  return known ?? `Sign-in failed (${code}).`;
}

const STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%);
      color: #fff;
    }
    .container {
      text-align: center;
      padding: 40px;
      min-width: 360px;
      background: rgba(255,255,255,0.1);
      border-radius: 16px;
      backdrop-filter: blur(10px);
    }
    h1 { margin: 0 0 10px; }
    p { opacity: 0.8; margin: 0 0 16px; }
    button {
      font-size: 16px;
      padding: 10px 24px;
      border: 0;
      border-radius: 8px;
      background: #4e8cff;
      color: #fff;
      cursor: pointer;
    }
    button:disabled { opacity: 0.5; cursor: default; }
    .error { color: #ff6b6b; }
    ul { list-style: none; padding: 0; }
    li { margin: 6px 0; }
    a { color: #8ab4ff; }`;

function layout(title: string, body: string): string {
  return `
<!DOCTYPE html>
<html>
<head>
  <title>Drive Backup - ${escapeHtml(title)}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
}

export function homePage(errorCode?: string): string {
  const error = errorCode ? `    <p class="error">${escapeHtml(describeLoginError(errorCode))}</p>\n` : '';
  return layout(
    'Sign in',
    `    <h1>Google Drive Backup</h1>
    <p>Download everything in your Drive as ZIP archives.</p>
${error}    <button id="login">Sign in with Google</button>
    <script>
      document.getElementById('login').addEventListener('click', async () => {
        const response = await fetch('/auth/login', { method: 'POST' });
        const data = await response.json();
        if (data.authUrl) window.location = data.authUrl;
        else alert(data.error || 'Sign-in is not available');
      });
    </script>`
  );
}

export function dashboardPage(): string {
  return layout(
    'Backup',
    `    <h1>Backup</h1>
    <p id="status">Ready</p>
    <p id="counts"></p>
    <button id="start">Start backup</button>
    <button id="cancel" disabled>Cancel</button>
    <ul id="archives"></ul>
    <script>
      const $ = (id) => document.getElementById(id);
      const running = (state) => state === 'created' || state === 'listing' || state === 'transferring';
      let timer = null;

      async function refresh() {
        const progress = await (await fetch('/download/progress')).json();
        $('status').textContent = progress.state + (progress.currentFile ? ': ' + progress.currentFile : '');
        $('counts').textContent = progress.processedFiles + ' processed, ' + progress.failedFiles + ' skipped'
          + (progress.error ? ' - ' + progress.error : '');
        $('start').disabled = running(progress.state);
        $('cancel').disabled = !running(progress.state);

        const files = await (await fetch('/download/files')).json();
        $('archives').replaceChildren(...files.archives.map((archive) => {
          const item = document.createElement('li');
          const link = document.createElement('a');
          link.href = archive.url;
          link.textContent = archive.fileName;
          item.appendChild(link);
          return item;
        }));

        if (running(progress.state) && !timer) {
          timer = setInterval(refresh, 2000);
        } else if (!running(progress.state) && timer) {
          clearInterval(timer);
          timer = null;
        }
      }

      $('start').addEventListener('click', async () => {
        await fetch('/download/start', { method: 'POST' });
        refresh();
      });
      $('cancel').addEventListener('click', async () => {
        await fetch('/download/cancel', { method: 'POST' });
        refresh();
      });
      refresh();
    </script>`
  );
}

export function errorPage(message: string): string {
  const safeMessage = escapeHtml(message);
  return layout(
    'Error',
    `    <h1 class="error">Something went wrong</h1>
    <p>${safeMessage}</p>
    <p><a href="/">Back to start</a></p>`
  );
}
