/**
 * Index Page
 *
 * Server-rendered landing page listing the price endpoints, the known
 * exchanges and the data-source mode switch.
 */

import { Hono } from "hono";
import { html } from "hono/html";
import type { ExchangeDirectory } from "../services/exchange-directory.ts";
import { STATISTIC_CAPABILITIES, PRICE_STATISTICS } from "../services/price-resolver.ts";

function periodNote(statistic: keyof typeof STATISTIC_CAPABILITIES): string {
  const { acceptsPeriod, periodWithoutExchange } = STATISTIC_CAPABILITIES[statistic];
  if (!acceptsPeriod) return "no period";
  return periodWithoutExchange ? "?period=D" : "?period=D (exchange required)";
}

export function createPageRoutes(exchanges: ExchangeDirectory): Hono {
  const pageRoutes = new Hono();

  pageRoutes.get("/", (c) => {
    const endpointRows = PRICE_STATISTICS.map(
      (statistic) => html`<tr>
        <td><code>/price/${statistic}/{symbol}</code></td>
        <td><code>/price/${statistic}/{exchange}/{symbol}</code></td>
        <td>${periodNote(statistic)}</td>
      </tr>`,
    );

    const exchangeRows = exchanges.entries().map(
      (e) => html`<li><code>${e.id}</code> &rarr; <code>${e.address}</code></li>`,
    );

    return c.html(html`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Price Query API</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 2rem auto; max-width: 860px; color: #1a1a25; }
    table { border-collapse: collapse; width: 100%; }
    td, th { border-bottom: 1px solid #ddd; padding: 0.4rem 0.6rem; text-align: left; }
    form { display: inline-block; margin-right: 0.5rem; }
    button { padding: 0.4rem 1rem; cursor: pointer; }
  </style>
</head>
<body>
  <h1>Price Query API</h1>

  <h2>Endpoints</h2>
  <table>
    <thead><tr><th>All exchanges</th><th>One exchange</th><th>Period</th></tr></thead>
    <tbody>${endpointRows}</tbody>
  </table>
  <p>Periods are durations such as <code>5m</code> or <code>1h30m</code> and must be positive.</p>

  <h2>Exchanges</h2>
  <ul id="exchanges">${exchangeRows}</ul>

  <h2>Data source</h2>
  <form method="post" action="/mode/test"><button type="submit">Test mode</button></form>
  <form method="post" action="/mode/live"><button type="submit">Live mode</button></form>

  <p><a href="/health">Health</a></p>
</body>
</html>`);
  });

  return pageRoutes;
}
