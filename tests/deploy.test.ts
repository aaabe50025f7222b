/**
 * Build trigger/poller and post-deploy flows.
 */
import { describe, test, expect } from "vitest";

import { DeployFailedException, DeployTimeoutException } from "../src/core/exceptions.js";
import type { BuildState, ReleaseTag } from "../src/core/types.js";
import { FlowRunner, buildFlowPayload } from "../src/deploy/flows.js";
import { JenkinsClient, isPassing, toBuildState } from "../src/deploy/jenkins.js";
import type { DeployParams, JenkinsClientOptions } from "../src/deploy/jenkins.js";
import {
  BUILD_URL,
  FakeHttp,
  FakeRemote,
  JENKINS_BASE,
  QUEUE_URL,
  silentLogger,
} from "./fixtures.js";

const PARAMS: DeployParams = {
  newTag: "008-20240110",
  oldTag: "007-20240105",
  gitUser: "deployer",
  gitToken: "test-secret",
  workEnv: "dv0",
  indexNameShort: "faq",
};

/** Clock that only moves when the client sleeps. */
function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  let t = 0;
  const sleeps: number[] = [];
  return {
    now: () => t,
    sleep: async (ms) => {
      sleeps.push(ms);
      t += ms;
    },
    sleeps,
  };
}

function jenkins(http: FakeHttp, overrides: Partial<JenkinsClientOptions> = {}): JenkinsClient {
  const clock = fakeClock();
  return new JenkinsClient({
    baseUrl: `${JENKINS_BASE}/`,
    job: "/job/index/",
    user: "deployer",
    apiToken: "test-secret",
    pollIntervalMs: 100,
    queueTimeoutMs: 10_000,
    buildTimeoutMs: 10_000,
    adapter: http.adapter,
    now: clock.now,
    sleep: clock.sleep,
    logger: silentLogger,
    ...overrides,
  });
}

describe("toBuildState", () => {
  test.each([
    ["SUCCESS", "success"],
    ["UNSTABLE", "unstable"],
    ["ABORTED", "aborted"],
    ["FAILURE", "failed"],
    ["NOT_BUILT", "failed"],
  ])("%s → %s", (result, state) => {
    expect(toBuildState(result)).toBe(state);
  });

  test("only success and unstable pass", () => {
    const states: BuildState[] = ["queued", "running", "success", "unstable", "failed", "aborted"];
    expect(states.filter(isPassing)).toEqual(["success", "unstable"]);
  });
});

describe("JenkinsClient", () => {
  test("trigger sends the build parameters with basic auth", async () => {
    const remote = new FakeRemote();
    const queue = await jenkins(remote.http, { jobToken: "job-secret" }).trigger(PARAMS);
    expect(queue).toBe(QUEUE_URL);
    const [req] = remote.http.requests;
    expect(req?.url).toBe(`${JENKINS_BASE}/job/index/buildWithParameters`);
    expect(req?.auth).toEqual({ username: "deployer", password: "test-secret" });
    expect(req?.params).toEqual({
      NEW_TAG: "008-20240110",
      OLD_TAG: "007-20240105",
      GIT_USER: "deployer",
      GIT_TOKEN: "test-secret",
      WORK_ENV: "dv0",
      INDEX_NAME_SHORT: "faq",
      token: "job-secret",
    });
  });

  test("trigger without Location fails", async () => {
    const http = new FakeHttp().on("POST", `${JENKINS_BASE}/job/index/buildWithParameters`, { status: 201 });
    await expect(jenkins(http).trigger(PARAMS)).rejects.toThrow("no Location header");
  });

  test("trigger rejected by the server fails", async () => {
    const http = new FakeHttp().on("POST", `${JENKINS_BASE}/job/index/buildWithParameters`, {
      status: 403,
      data: "forbidden",
    });
    await expect(jenkins(http).trigger(PARAMS)).rejects.toThrow("trigger failed: HTTP 403: forbidden");
  });

  test("deploy follows queue and build to success", async () => {
    const remote = new FakeRemote();
    const states: BuildState[] = [];
    const state = await jenkins(remote.http).deploy(PARAMS, (s) => {
      states.push(s);
    });
    expect(state).toBe("success");
    expect(states).toEqual(["queued", "running", "success"]);
  });

  test("unstable passes", async () => {
    const remote = new FakeRemote();
    remote.buildResult = "UNSTABLE";
    expect(await jenkins(remote.http).deploy(PARAMS)).toBe("unstable");
  });

  test.each([
    ["FAILURE", "build ended failed"],
    ["ABORTED", "build ended aborted"],
  ])("%s fails the deploy", async (result, message) => {
    const remote = new FakeRemote();
    remote.buildResult = result;
    await expect(jenkins(remote.http).deploy(PARAMS)).rejects.toThrow(message);
  });

  test("queue is polled until the build starts", async () => {
    let polls = 0;
    const http = new FakeHttp().on("GET", `${QUEUE_URL}api/json`, () => {
      polls++;
      return { status: 200, data: polls < 3 ? { executable: null } : { executable: { url: BUILD_URL } } };
    });
    const clock = fakeClock();
    const client = jenkins(http, { now: clock.now, sleep: clock.sleep });
    expect(await client.waitForBuild(QUEUE_URL)).toBe(BUILD_URL);
    expect(polls).toBe(3);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  test("cancelled queue item fails", async () => {
    const http = new FakeHttp().on("GET", `${QUEUE_URL}api/json`, { status: 200, data: { cancelled: true } });
    await expect(jenkins(http).waitForBuild(QUEUE_URL)).rejects.toThrow("queue item was cancelled");
  });

  test("queue deadline", async () => {
    let polls = 0;
    const http = new FakeHttp().on("GET", `${QUEUE_URL}api/json`, () => {
      polls++;
      return { status: 200, data: {} };
    });
    const err = await jenkins(http, { queueTimeoutMs: 250 })
      .waitForBuild(QUEUE_URL)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeployTimeoutException);
    expect(err).toBeInstanceOf(DeployFailedException);
    expect(polls).toBe(3);
  });

  test("build is polled until it has a result", async () => {
    let polls = 0;
    const http = new FakeHttp().on("GET", `${BUILD_URL}api/json`, () => {
      polls++;
      return { status: 200, data: { result: polls < 4 ? null : "SUCCESS" } };
    });
    expect(await jenkins(http).waitForResult(BUILD_URL)).toBe("success");
    expect(polls).toBe(4);
  });

  test("build deadline", async () => {
    const http = new FakeHttp().on("GET", `${BUILD_URL}api/json`, { status: 200, data: { result: null } });
    await expect(jenkins(http, { buildTimeoutMs: 1000 }).waitForResult(BUILD_URL)).rejects.toThrow(
      "build did not finish within 1000ms",
    );
  });
});

// ---------------------------------------------------------------------------
// Flows
// ---------------------------------------------------------------------------

const TAG: ReleaseTag = { name: "008-20240110", sequence: 8, date: "20240110", previous: "007-20240105" };

const FLOW_URLS = ["https://flows.test/one", "https://flows.test/two", "https://flows.test/three"];

function flowHttp(statuses: number[]): FakeHttp {
  const http = new FakeHttp();
  FLOW_URLS.forEach((url, i) => http.on("POST", url, { status: statuses[i] ?? 200, data: `flow ${i + 1}` }));
  return http;
}

describe("buildFlowPayload", () => {
  test("splits tags into sequence and date", () => {
    expect(buildFlowPayload(TAG, PARAMS)).toEqual({
      newTag: "008",
      oldTag: "007",
      newTagDate: "20240110",
      oldTagDate: "20240105",
      gitUser: "deployer",
      gitToken: "test-secret",
      workEnv: "dv0",
      indexNameShort: "faq",
    });
  });

  test("first release has no old tag", () => {
    const payload = buildFlowPayload({ ...TAG, previous: null }, PARAMS);
    expect(payload.oldTag).toBe("");
    expect(payload.oldTagDate).toBe("");
  });
});

describe("FlowRunner", () => {
  test("runs every flow in order", async () => {
    const http = flowHttp([200, 200, 200]);
    const runner = new FlowRunner({ urls: FLOW_URLS, sendJson: true, adapter: http.adapter, logger: silentLogger });
    const results = await runner.run(buildFlowPayload(TAG, PARAMS));
    expect(results).toEqual([
      { url: FLOW_URLS[0], status: 200, detail: "flow 1" },
      { url: FLOW_URLS[1], status: 200, detail: "flow 2" },
      { url: FLOW_URLS[2], status: 200, detail: "flow 3" },
    ]);
    expect(http.requests[0]?.body).toEqual(buildFlowPayload(TAG, PARAMS));
    expect(http.requests[0]?.headers["content-type"]).toBe("application/json");
  });

  test("stops at the first non-200 answer", async () => {
    const http = flowHttp([200, 500, 200]);
    const runner = new FlowRunner({ urls: FLOW_URLS, sendJson: true, adapter: http.adapter, logger: silentLogger });
    const results = await runner.run(buildFlowPayload(TAG, PARAMS));
    expect(results.map((r) => r.status)).toEqual([200, 500]);
    expect(http.requests).toHaveLength(2);
  });

  test("form encoding", async () => {
    const http = flowHttp([200]);
    const runner = new FlowRunner({
      urls: FLOW_URLS.slice(0, 1),
      sendJson: false,
      adapter: http.adapter,
      logger: silentLogger,
    });
    await runner.run(buildFlowPayload(TAG, PARAMS));
    expect(http.requests[0]?.headers["content-type"]).toBe("application/x-www-form-urlencoded");
    expect(http.requests[0]?.body).toBe(
      "newTag=008&oldTag=007&newTagDate=20240110&oldTagDate=20240105&gitUser=deployer&gitToken=test-secret&workEnv=dv0&indexNameShort=faq",
    );
  });

  test("an unreachable flow is reported, not thrown", async () => {
    const http = new FakeHttp().on("POST", FLOW_URLS[0] ?? "", () => {
      throw new Error("connect ECONNREFUSED");
    });
    const runner = new FlowRunner({ urls: FLOW_URLS, sendJson: true, adapter: http.adapter, logger: silentLogger });
    expect(await runner.run(buildFlowPayload(TAG, PARAMS))).toEqual([
      { url: FLOW_URLS[0], status: 0, detail: "connect ECONNREFUSED" },
    ]);
  });

  test("blank URLs are not flows", () => {
    const runner = new FlowRunner({ urls: ["", "  "], sendJson: true, logger: silentLogger });
    expect(runner.configured).toBe(false);
  });

  test("at most three flows run", async () => {
    const http = flowHttp([200, 200, 200]).on("POST", "https://flows.test/four", { status: 200 });
    const runner = new FlowRunner({
      urls: [...FLOW_URLS, "https://flows.test/four"],
      sendJson: true,
      adapter: http.adapter,
      logger: silentLogger,
    });
    expect(await runner.run(buildFlowPayload(TAG, PARAMS))).toHaveLength(3);
    expect(http.requestsTo("POST", /four$/)).toEqual([]);
  });
});
