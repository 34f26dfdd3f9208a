export const commonStyles = `
    :root {
      --bg: #f5f7f9;
      --surface: #ffffff;
      --text: #2c2c2c;
      --text-secondary: #5a5a5a;
      --border-light: #cbd5e1;
      --header-bg: #216c6d;
      --header-text: #ffffff;
      --primary: #2d9d5f;
      --primary-hover: #248f54;
      --pass: #248f54;
      --pass-bg: #e8f5ee;
      --fail: #c62828;
      --fail-bg: #ffebee;
      --warning: #92400e;
      --warning-bg: #fffbeb;
      --muted: #6b7c85;
      --row-alt: #fafbfc;
      --radius: 6.8px;
      --radius-sm: 5.1px;
      --shadow-sm: 0 0.85px 2.55px rgba(0, 0, 0, 0.08);
    }
    * { box-sizing: border-box; }
    button, input, select, textarea { font-family: inherit; }
    button:active:not(:disabled) { transform: scale(0.97); }

    html { overflow-y: scroll; scrollbar-gutter: stable; }

    @keyframes appFadeIn { from { opacity: 0; } to { opacity: 1; } }
    body {
      margin: 0; padding: 0; background: var(--bg); color: var(--text);
      font-family: 'JetBrains Mono', monospace;
      line-height: 1.4; font-size: 13px; display: flex; flex-direction: column;
      animation: appFadeIn 0.6s ease-out both;
    }

    .app-container { display: flex; min-height: 100vh; width: 100%; }
    .content-wrapper { flex: 1; display: flex; flex-direction: column; min-width: 0; background: #f5f7f9; }

    .header {
      background: rgba(255, 255, 255, 0.9);
      border: 1px solid rgba(176, 191, 201, 0.45); border-radius: var(--radius);
      box-shadow: 0 4px 20px rgba(0, 0, 0, 0.06); margin: 0.75rem auto 0.5rem auto;
      width: calc(100% - 2.5rem); max-width: 1820px;
      min-height: 64px; padding: 0.6rem 1.25rem;
      display: flex; align-items: center; justify-content: space-between;
    }
    .header-main-title { margin: 0; font-size: 1.15rem; font-weight: 800; color: var(--text); letter-spacing: -0.01em; }

    .main {
      flex: 1; display: flex; flex-direction: column;
      padding: 0 0 1.25rem 0; max-width: 1820px; width: calc(100% - 2.5rem);
      margin: 0 auto;
    }

    .footer { text-align: center; color: var(--muted); font-size: 0.7rem; padding: 1rem 0; }

    #page-loader {
      position: fixed; inset: 0; background: rgba(245, 247, 249, 0.85); z-index: 20000;
      display: none; flex-direction: column; align-items: center; justify-content: center; gap: 0.75rem;
    }
    .loader-spinner {
      width: 32px; height: 32px; border: 3px solid rgba(45, 157, 95, 0.2);
      border-top-color: var(--primary); border-radius: 50%; animation: spin 0.7s linear infinite;
    }
    .loader-text { font-size: 0.75rem; font-weight: 700; color: var(--muted); }
    @keyframes spin { to { transform: rotate(360deg); } }
`;
