import { describe, it, expect } from "vitest";
import { createPageRoutes } from "./pages.ts";
import { createExchangeDirectory } from "../services/exchange-directory.ts";

describe("GET /", () => {
  const app = createPageRoutes(
    createExchangeDirectory([
      { id: "exchange1", address: "exchange1:40101" },
      { id: "<venue>", address: "venue:1" },
    ]),
  );

  it("should render the index page", async () => {
    const res = await app.request("http://localhost/");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toMatch(/^text\/html/);

    const page = await res.text();
    expect(page).toContain("<title>Price Query API</title>");
    expect(page).toContain("<td><code>/price/average/{exchange}/{symbol}</code></td>");
    expect(page).toContain("<td>?period=D (exchange required)</td>");
    expect(page).toContain('<form method="post" action="/mode/live">');
  });

  it("should list exchanges with escaped names", async () => {
    const page = await (await app.request("http://localhost/")).text();

    expect(page).toContain("<li><code>exchange1</code> &rarr; <code>exchange1:40101</code></li>");
    expect(page).toContain("<li><code>&lt;venue&gt;</code> &rarr; <code>venue:1</code></li>");
  });
});
