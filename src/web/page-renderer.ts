/**
 * Dashboard document
 *
 * Wraps the tiles of a built page into one HTML document. Dark theme, tiles
 * in a wrapping grid. The browser runtime at the bottom connects the session
 * for this page's token.
 */

import { PageAccumulator } from './page';
import { escapeHtml } from './html';
import { getClientRuntimeScript } from './client-runtime';

export interface RenderOptions {
  title: string;
  pageToken: string;
  wsPath?: string;
}

const STYLES = `
  *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }
  :root {
    --bg: #0c0e14;
    --surface: rgba(255,255,255,0.03);
    --border: rgba(255,255,255,0.06);
    --text: #e2e8f0;
    --text-dim: rgba(255,255,255,0.4);
    --text-dimmer: rgba(255,255,255,0.25);
    --green: #00e5a0;
    --red: #ff6b6b;
    --yellow: #ffc23a;
    --mono: 'JetBrains Mono', 'SF Mono', 'Fira Code', monospace;
  }
  body {
    background: var(--bg);
    color: var(--text);
    font-family: var(--mono);
    padding: 32px;
    min-height: 100vh;
  }
  .header { margin-bottom: 24px; display: flex; align-items: baseline; gap: 16px; }
  .header h1 { font-size: 22px; font-weight: 700; letter-spacing: -0.02em; }
  .status-badge {
    font-size: 11px; font-weight: 600; padding: 3px 10px; border-radius: 4px;
    text-transform: uppercase; letter-spacing: 1px;
  }
  .status-badge.ok { color: var(--green); border: 1px solid rgba(0,229,160,0.3); }
  .status-badge.degraded { color: var(--red); border: 1px solid rgba(255,107,107,0.3); }
  .tiles { display: flex; flex-wrap: wrap; gap: 16px; }
  .tile {
    width: 240px;
    border: 1px solid var(--border);
    border-radius: 8px;
    background: var(--surface);
    padding: 16px;
  }
  .tile-title {
    font-size: 10px; font-weight: 600; text-transform: uppercase;
    letter-spacing: 1.5px; color: var(--text-dimmer); margin-bottom: 12px;
  }
  .tile-row { font-size: 12px; color: var(--text-dim); padding: 2px 0; }
  .tile-row .val { color: var(--text); }
  .btn {
    background: rgba(255,255,255,0.05); color: var(--text); border: 1px solid var(--border);
    padding: 6px 12px; border-radius: 6px; font-family: var(--mono); font-size: 12px; cursor: pointer;
  }
  .btn.on { color: var(--green); border-color: rgba(0,229,160,0.3); }
  .btn-danger { color: var(--red); }
  .btn-group { display: flex; gap: 6px; margin-top: 8px; }
  .brightness-bar {
    width: 200px; height: 14px; margin-top: 10px; border-radius: 3px;
    background: rgba(255,255,255,0.08); cursor: pointer; overflow: hidden;
  }
  .brightness-fill { height: 100%; background: var(--yellow); }
  .group-members { margin-top: 8px; display: none; }
  .tile.editing .group-members, .group-members.visible { display: block; }
  .update-text { color: var(--yellow); }
`;

export function renderPageDocument(page: PageAccumulator, options: RenderOptions): string {
  const title = escapeHtml(options.title);
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="header">
  <h1>${title}</h1>
  <span id="session-status" class="status-badge ok">live</span>
</div>
<div class="tiles">
${page.tiles.join('\n')}
</div>
<script>${getClientRuntimeScript(options.pageToken, options.wsPath)}</script>
</body>
</html>
`;
}
