import { ZodError } from "zod";
import { GitHubApiError, GitHubClient, MAX_PAGES, PAGE_SIZE } from "../src/githubClient.js";
import { PullRequestsPage } from "../src/schemas.js";
import { createFakeFetch, pageNumber, rejection } from "./fakeFetch.js";

function pulls(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    user: { login: `user${i}` },
    state: "closed",
    created_at: "2026-10-01T00:00:00Z",
    merged_at: null,
  }));
}

describe("GitHubClient", () => {
  describe("get", () => {
    it("sends the bearer token and GitHub headers", async () => {
      const fake = createFakeFetch(() => ({ body: [] }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      await client.get("/repos/acme/widgets/pulls", { state: "open" }, PullRequestsPage);

      expect(fake.requests).toHaveLength(1);
      const { url, headers } = fake.requests[0];
      expect(url.origin).toBe("https://api.github.com");
      expect(url.pathname).toBe("/repos/acme/widgets/pulls");
      expect(url.searchParams.get("state")).toBe("open");
      expect(headers.get("authorization")).toBe("Bearer test-token");
      expect(headers.get("accept")).toBe("application/vnd.github+json");
      expect(headers.get("x-github-api-version")).toBe("2022-11-28");
    });

    it("omits the authorization header without a token", async () => {
      const fake = createFakeFetch(() => ({ body: [] }));
      const client = new GitHubClient({ token: "", fetch: fake.fetch });
      await client.get("/repos/acme/widgets/pulls", {}, PullRequestsPage);
      expect(fake.requests[0].headers.get("authorization")).toBeNull();
    });

    it("maps the payload through the schema", async () => {
      const fake = createFakeFetch(() => ({
        body: [{ user: { login: "alice" }, state: "closed", created_at: "2026-10-01T00:00:00Z", merged_at: "2026-10-01T02:00:00Z" }],
      }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const result = await client.get("/repos/acme/widgets/pulls", {}, PullRequestsPage);
      expect(result).toEqual([
        { authorLogin: "alice", state: "closed", createdAt: "2026-10-01T00:00:00Z", mergedAt: "2026-10-01T02:00:00Z" },
      ]);
    });

    it("throws GitHubApiError on a non-success status", async () => {
      const fake = createFakeFetch(() => ({ status: 404, body: { message: "Not Found" } }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const err = await rejection(client.get("/repos/acme/missing/pulls", {}, PullRequestsPage));
      expect(err).toBeInstanceOf(GitHubApiError);
      if (err instanceof GitHubApiError) {
        expect(err.status).toBe(404);
        expect(err.url).toBe("https://api.github.com/repos/acme/missing/pulls");
      }
    });

    it("rejects payloads of the wrong shape", async () => {
      const fake = createFakeFetch(() => ({ body: { message: "not a list" } }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      await expect(client.get("/repos/acme/widgets/pulls", {}, PullRequestsPage)).rejects.toBeInstanceOf(ZodError);
    });
  });

  describe("getPaginated", () => {
    it("stops at the first short page", async () => {
      const fake = createFakeFetch((url) => ({ body: pulls(pageNumber(url) === 1 ? PAGE_SIZE : 40) }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const items = await client.getPaginated("/repos/acme/widgets/pulls", { state: "closed" }, PullRequestsPage);

      expect(items).toHaveLength(140);
      expect(fake.requests.map((r) => r.url.searchParams.get("page"))).toEqual(["1", "2"]);
      expect(fake.requests.every((r) => r.url.searchParams.get("per_page") === "100")).toBe(true);
      expect(fake.requests.every((r) => r.url.searchParams.get("state") === "closed")).toBe(true);
    });

    it("stops after an empty first page", async () => {
      const fake = createFakeFetch(() => ({ body: [] }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const items = await client.getPaginated("/repos/acme/widgets/pulls", {}, PullRequestsPage);
      expect(items).toEqual([]);
      expect(fake.requests).toHaveLength(1);
    });

    it("stops after exactly ten full pages", async () => {
      const fake = createFakeFetch(() => ({ body: pulls(PAGE_SIZE) }));
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const items = await client.getPaginated("/repos/acme/widgets/pulls", {}, PullRequestsPage);

      expect(MAX_PAGES).toBe(10);
      expect(fake.requests).toHaveLength(10);
      expect(fake.requests[9].url.searchParams.get("page")).toBe("10");
      expect(items).toHaveLength(1000);
    });

    it("aborts the whole collection when a later page fails", async () => {
      const fake = createFakeFetch((url) =>
        pageNumber(url) === 1 ? { body: pulls(PAGE_SIZE) } : { status: 502, body: { message: "Bad Gateway" } },
      );
      const client = new GitHubClient({ token: "test-token", fetch: fake.fetch });
      const err = await rejection(client.getPaginated("/repos/acme/widgets/pulls", {}, PullRequestsPage));
      expect(err).toBeInstanceOf(GitHubApiError);
      if (err instanceof GitHubApiError) expect(err.status).toBe(502);
      expect(fake.requests).toHaveLength(2);
    });
  });
});
