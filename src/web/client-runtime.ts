/**
 * Browser runtime
 *
 * Inline script shipped with every dashboard page. It opens the session
 * WebSocket, announces the page token, runs the scripts the server sends,
 * answers element queries, and exposes window.lightDeck.call() for event
 * bindings to report back with a callback token.
 */

import { scriptLiteral } from './html';

export function getClientRuntimeScript(pageToken: string, wsPath = '/session'): string {
  return `(function () {
  var queue = [];
  var proto = location.protocol === 'https:' ? 'wss:' : 'ws:';
  var ws = new WebSocket(proto + '//' + location.host + ${scriptLiteral(wsPath)});

  function send(msg) {
    var payload = JSON.stringify(msg);
    if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    else queue.push(payload);
  }

  window.lightDeck = {
    call: function (token, args) {
      send({ type: 'callback', token: token, args: args || [] });
    }
  };

  ws.onopen = function () {
    ws.send(JSON.stringify({ type: 'attach', page: ${scriptLiteral(pageToken)} }));
    while (queue.length) ws.send(queue.shift());
  };

  ws.onmessage = function (ev) {
    var msg;
    try { msg = JSON.parse(ev.data); } catch (e) { return; }
    if (msg.type === 'run') {
      for (var i = 0; i < msg.scripts.length; i++) {
        try { new Function(msg.scripts[i])(); }
        catch (e) { console.error('[lightDeck] script failed', e); }
      }
    } else if (msg.type === 'query-element') {
      send({
        type: 'element-result',
        requestId: msg.requestId,
        exists: document.getElementById(msg.elementId) !== null
      });
    }
  };

  ws.onclose = function () {
    var badge = document.getElementById('session-status');
    if (badge) { badge.textContent = 'offline'; badge.className = 'status-badge degraded'; }
  };
})();`;
}
