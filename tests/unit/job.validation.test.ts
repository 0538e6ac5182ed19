import { classifyActivatedJob, missingTopicMessage } from "../../src/application/source-task/job.validation";
import { createJob } from "./fixtures/jobs";

describe("classifyActivatedJob", () => {
  it("enqueues a job carrying the topic header", () => {
    expect(classifyActivatedJob(createJob(), "kafkaTopic")).toEqual({ action: "enqueue", topic: "orders" });
  });

  it.each<[string, Record<string, string>]>([
    ["absent", {}],
    ["empty", { kafkaTopic: "" }]
  ])("fails a job whose header is %s", (_label, customHeaders) => {
    const job = createJob({ key: "77", retries: 3, customHeaders });

    expect(classifyActivatedJob(job, "kafkaTopic")).toEqual({
      action: "fail",
      retries: 2,
      errorMessage:
        "Expected a kafka topic to be defined as a custom header with key 'kafkaTopic', but none found",
      log: {
        event: "source.job_invalid",
        jobKey: "77",
        jobType: "A",
        header: "kafkaTopic"
      }
    });
  });

  it("does not take inherited properties for headers", () => {
    const job = createJob({ key: "78", customHeaders: {} });

    expect(classifyActivatedJob(job, "constructor")).toMatchObject({
      action: "fail",
      errorMessage:
        "Expected a kafka topic to be defined as a custom header with key 'constructor', but none found"
    });
  });

  it.each(["-5", "12a", ""])("fails a job whose key %p is not a decimal integer", (key) => {
    const job = createJob({ key, retries: 1 });

    expect(classifyActivatedJob(job, "kafkaTopic")).toEqual({
      action: "fail",
      retries: 0,
      errorMessage: `Expected a decimal job key, but got '${key}'`,
      log: { event: "source.job_key_invalid", jobKey: key, jobType: "A" }
    });
  });

  it("names the configured header in the message", () => {
    expect(missingTopicMessage("topic")).toBe(
      "Expected a kafka topic to be defined as a custom header with key 'topic', but none found"
    );
  });
});
