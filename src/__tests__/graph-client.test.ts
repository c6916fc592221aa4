/**
 * Tests for the Graph HTTP client with MSAL and fetch mocked.
 */
import { GraphClient, GraphRequestError } from "../channels/email/graph-client.js";

const mockAcquireToken = jest.fn();

jest.mock("@azure/msal-node", () => ({
  ConfidentialClientApplication: jest.fn().mockImplementation(() => ({
    acquireTokenByClientCredential: mockAcquireToken,
  })),
}));

const tenant = { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" };

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

let fetchMock: jest.SpiedFunction<typeof fetch>;

beforeEach(() => {
  mockAcquireToken.mockReset();
  mockAcquireToken.mockResolvedValue({
    accessToken: "test-token",
    expiresOn: new Date(Date.now() + 3_600_000),
  });
  fetchMock = jest.spyOn(global, "fetch");
});

afterEach(() => {
  fetchMock.mockRestore();
});

function requestedUrl(call: number): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}

describe("GraphClient", () => {
  it("follows nextLink pages", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({
        value: [{ id: "u1", displayName: "A", mail: null, userPrincipalName: "a@x.test" }],
        "@odata.nextLink": "https://graph.microsoft.com/v1.0/users?$skiptoken=2",
      }))
      .mockResolvedValueOnce(jsonResponse({
        value: [{ id: "u2", displayName: "B", mail: null, userPrincipalName: "b@x.test" }],
      }));

    const users: string[] = [];
    for await (const user of new GraphClient(tenant).listUsers()) users.push(user.id);

    expect(users).toEqual(["u1", "u2"]);
    expect(requestedUrl(0)).toBe("https://graph.microsoft.com/v1.0/users?$select=id,displayName,mail,userPrincipalName&$top=100");
    expect(requestedUrl(1)).toBe("https://graph.microsoft.com/v1.0/users?$skiptoken=2");
  });

  it("sends the bearer token and reuses it until it expires", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ id: "inbox" }));
    const client = new GraphClient(tenant);

    await client.hasMailbox("u1");
    await client.hasMailbox("u2");

    expect(mockAcquireToken).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("treats a missing inbox as no mailbox", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { code: "ErrorItemNotFound" } }, 404));
    expect(await new GraphClient(tenant).hasMailbox("u1")).toBe(false);
  });

  it("stops listing messages at the limit", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      value: [{ id: "m1" }, { id: "m2" }, { id: "m3" }],
      "@odata.nextLink": "https://graph.microsoft.com/v1.0/next",
    }));

    const ids: string[] = [];
    for await (const msg of new GraphClient(tenant).listMessages("u1", 2)) ids.push(msg.id);

    expect(ids).toEqual(["m1", "m2"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestedUrl(0)).toContain("$top=2");
  });

  it("returns raw MIME bytes", async () => {
    fetchMock.mockResolvedValueOnce(new Response("From: a@x.test\r\n\r\nbody", { status: 200 }));

    const bytes = await new GraphClient(tenant).getMimeContent("u1", "m/1");

    expect(bytes.toString()).toBe("From: a@x.test\r\n\r\nbody");
    expect(requestedUrl(0)).toBe("https://graph.microsoft.com/v1.0/users/u1/messages/m%2F1/$value");
  });

  it("waits out throttling before retrying", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "0" } }))
      .mockResolvedValueOnce(jsonResponse({ id: "inbox" }));

    expect(await new GraphClient(tenant).hasMailbox("u1")).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after the throttle retries", async () => {
    fetchMock.mockImplementation(async () => new Response("busy", { status: 503, headers: { "Retry-After": "0" } }));

    await expect(new GraphClient(tenant, { maxThrottleRetries: 2 }).hasMailbox("u1"))
      .rejects.toMatchObject({ status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("throws GraphRequestError on other failures", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Forbidden", { status: 403 }));

    const err = await new GraphClient(tenant).getMimeContent("u1", "m1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GraphRequestError);
    expect(err).toMatchObject({ status: 403, message: "Graph GET 403: Forbidden" });
  });

  it("summarises Azure AD errors in the connection test", async () => {
    mockAcquireToken.mockRejectedValueOnce(
      new Error("invalid_client: AADSTS7000215: Invalid client secret provided.\r\nTrace ID: 123"),
    );

    expect(await new GraphClient(tenant).testConnection()).toEqual({
      success: false,
      error: "Azure AD error: Invalid client secret provided.",
    });
  });

  it("reports a working connection", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ value: [{ id: "u1" }] }));
    expect(await new GraphClient(tenant).testConnection()).toEqual({ success: true, userCount: 1 });
  });
});
