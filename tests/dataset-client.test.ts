import { describe, it, expect } from "vitest";
import axios, { AxiosError } from "axios";
import type { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { DatasetApiClient, datasetNameFor } from "../src/upload/dataset_client.js";
import { UploadFailedError } from "../src/shared/errors.js";

interface Captured {
  url?: string;
  method?: string;
  data?: unknown;
}

/** axios instance whose adapter answers in-process with the given status. */
function stubHttp(status: number, data: unknown, captured: Captured) {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      captured.url = config.url;
      captured.method = config.method;
      captured.data = typeof config.data === "string" ? JSON.parse(config.data) : config.data;
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 200 && status < 300) return response;
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, null, response);
    },
  });
}

describe("datasetNameFor", () => {
  it("uses the last path segment", () => {
    expect(datasetNameFor("/data/output/ds-7")).toBe("ds-7");
    expect(datasetNameFor("/data/output/ds-7/")).toBe("ds-7");
    expect(datasetNameFor("ds-7")).toBe("ds-7");
  });
});

describe("DatasetApiClient", () => {
  it("builds the add-files endpoint from the base URL and dataset name", () => {
    const client = new DatasetApiClient({ baseUrl: "http://api.test/dm/" });
    expect(client.endpointFor("/exports/ds-1")).toBe("http://api.test/dm/datasets/ds-1/files/upload/add");
  });

  it("posts the files payload and returns the status", async () => {
    const captured: Captured = {};
    const client = new DatasetApiClient({ baseUrl: "http://api.test/dm", http: stubHttp(200, { added: 1 }, captured) });
    const res = await client.addFiles("/exports/ds-1", [{ filePath: "/mnt/a.png" }]);

    expect(res).toEqual({ status: 200, body: { added: 1 } });
    expect(captured.url).toBe("http://api.test/dm/datasets/ds-1/files/upload/add");
    expect(captured.method).toBe("post");
    expect(captured.data).toEqual({ files: [{ filePath: "/mnt/a.png" }] });
  });

  it("rejects non-2xx responses with status and body", async () => {
    const client = new DatasetApiClient({ baseUrl: "http://api.test/dm", http: stubHttp(422, { detail: "bad path" }, {}) });
    const err = await client.addFiles("ds-1", []).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UploadFailedError);
    if (err instanceof UploadFailedError) {
      expect(err.status).toBe(422);
      expect(err.responseBody).toBe('{"detail":"bad path"}');
      expect(err.message).toBe("HTTP 422 from http://api.test/dm/datasets/ds-1/files/upload/add");
    }
  });
});
