import { describe, it, expect } from "vitest";
import {
  parseQacct,
  parseQacctRecords,
  parseQstatJobDetail,
  parseQstatPlain,
  parseQstatXml,
  parseQsubOutput,
  sgeAccountingStatus,
  sgeAccountingToJobInfo,
  sgeDetailFields,
  sgeRecordToJobInfo,
  sgeStateToStatus
} from "../src/schedulers/sge/parser.js";

const QSTAT_XML = `<?xml version='1.0'?>
<job_info xmlns:xsd="http://arc.liv.ac.uk/repos/darcs/sge/source/dist/util/resources/schemas/qstat/qstat.xsd">
  <queue_info>
    <job_list state="running">
      <JB_job_number>12345</JB_job_number>
      <JAT_prio>0.55500</JAT_prio>
      <JB_name>align</JB_name>
      <JB_owner>alice</JB_owner>
      <state>r</state>
      <JAT_start_time>2024-01-01T10:00:00</JAT_start_time>
      <queue_name>all.q@node1</queue_name>
      <slots>4</slots>
    </job_list>
  </queue_info>
  <job_info>
    <job_list state="pending">
      <JB_job_number>12346</JB_job_number>
      <JB_name>sort</JB_name>
      <JB_owner>bob</JB_owner>
      <state>qw</state>
      <JB_submission_time>2024-01-01T11:00:00</JB_submission_time>
      <hard_req_queue>long.q</hard_req_queue>
      <slots>1</slots>
    </job_list>
    <job_list state="pending">
      <JB_job_number>12347</JB_job_number>
      <JB_name>sweep</JB_name>
      <JB_owner>alice</JB_owner>
      <state>qw</state>
      <slots>1</slots>
      <tasks>3</tasks>
    </job_list>
    <job_list state="pending">
      <JB_name>no-id</JB_name>
    </job_list>
  </job_info>
</job_info>
`;

describe("parseQstatXml", () => {
  it("reads running and pending sections", () => {
    const jobs = parseQstatXml(QSTAT_XML);
    expect([...jobs.keys()]).toEqual(["12345", "12346", "12347.3"]);

    const running = jobs.get("12345");
    expect(running?.queue).toBe("all.q");
    expect(running?.slots).toBe(4);
    expect(running?.state).toBe("r");
    expect(running?.startTime).toEqual(new Date(2024, 0, 1, 10, 0, 0));

    const pending = jobs.get("12346");
    expect(pending?.queue).toBe("long.q");
    expect(pending?.submitTime).toEqual(new Date(2024, 0, 1, 11, 0, 0));

    const task = jobs.get("12347.3");
    expect(task?.jobId).toBe("12347");
    expect(task?.arrayTaskId).toBe("3");
  });

  it("accepts epoch-second timestamps", () => {
    const xml =
      "<job_info><queue_info><job_list><JB_job_number>1</JB_job_number>" +
      "<JB_submission_time>1704103200</JB_submission_time></job_list></queue_info></job_info>";
    expect(parseQstatXml(xml).get("1")?.submitTime).toEqual(new Date(1704103200 * 1000));
  });

  it("recovers every field of a running array task", () => {
    const xml =
      "<job_info><queue_info><job_list state=\"running\">" +
      "<JB_job_number>700</JB_job_number><JB_name>sweep</JB_name><JB_owner>alice</JB_owner>" +
      "<state>r</state><queue_name>gpu.q@node3</queue_name><slots>2</slots>" +
      "<JB_submission_time>2024-01-01T09:30:00</JB_submission_time>" +
      "<JAT_start_time>2024-01-01T10:00:00</JAT_start_time><tasks>5</tasks>" +
      "</job_list></queue_info></job_info>";
    const jobs = parseQstatXml(xml);
    expect([...jobs.keys()]).toEqual(["700.5"]);

    const record = jobs.get("700.5");
    if (!record) throw new Error("missing record");
    expect(sgeRecordToJobInfo(record, new Date(2024, 0, 1, 12, 0, 0))).toEqual({
      jobId: "700.5",
      name: "sweep",
      user: "alice",
      status: "RUNNING",
      queue: "gpu.q",
      submitTime: new Date(2024, 0, 1, 9, 30, 0),
      startTime: new Date(2024, 0, 1, 10, 0, 0),
      endTime: null,
      runtimeSeconds: 7200,
      cpu: 2,
      memory: null,
      gpu: null,
      exitCode: null,
      stdoutPath: null,
      stderrPath: null,
      node: null,
      dependencies: null,
      arrayTaskId: "5"
    });
  });

  it("keeps running tasks of one array apart", () => {
    const task = (n: number): string =>
      `<job_list><JB_job_number>700</JB_job_number><JB_owner>alice</JB_owner><state>r</state><tasks>${n}</tasks></job_list>`;
    const jobs = parseQstatXml(`<job_info><queue_info>${task(1)}${task(2)}</queue_info></job_info>`);
    const now = new Date(2024, 0, 1, 12, 0, 0);
    expect([...jobs.values()].map((r) => sgeRecordToJobInfo(r, now).jobId)).toEqual(["700.1", "700.2"]);
  });

  it("returns an empty map for malformed xml", () => {
    expect(parseQstatXml("<job_info><queue_info>").size).toBe(0);
    expect(parseQstatXml("").size).toBe(0);
  });

  it("converts to JobInfo with runtime measured from the start time", () => {
    const record = parseQstatXml(QSTAT_XML).get("12345");
    if (!record) throw new Error("missing record");
    const job = sgeRecordToJobInfo(record, new Date(2024, 0, 1, 12, 0, 0));
    expect(job.status).toBe("RUNNING");
    expect(job.runtimeSeconds).toBe(7200);
    expect(job.cpu).toBe(4);
    expect(job.name).toBe("align");
    expect(job.user).toBe("alice");
  });
});

describe("parseQstatPlain", () => {
  const output = [
    "job-ID  prior   name       user         state submit/start at     queue                          slots ja-task-ID",
    "-----------------------------------------------------------------------------------------------------------------",
    "  12345 0.55500 align      alice        r     01/01/2024 10:00:00 all.q@node1                        4",
    "  12346 0.00000 sort       bob          qw    01/01/2024 11:00:00                                    1",
    "  12347 0.00000 sweep      alice        qw    01/01/2024 11:30:00                                    1 1-10:1",
    "  short row"
  ].join("\n");

  it("skips the header and short rows", () => {
    const jobs = parseQstatPlain(output);
    expect([...jobs.keys()]).toEqual(["12345", "12346", "12347"]);
  });

  it("assigns the date to start or submit time by state", () => {
    const jobs = parseQstatPlain(output);
    expect(jobs.get("12345")?.startTime).toEqual(new Date(2024, 0, 1, 10, 0, 0));
    expect(jobs.get("12345")?.queue).toBe("all.q@node1");
    expect(jobs.get("12345")?.slots).toBe(4);
    expect(jobs.get("12346")?.submitTime).toEqual(new Date(2024, 0, 1, 11, 0, 0));
    expect(jobs.get("12346")?.queue).toBeUndefined();
    expect(jobs.get("12346")?.slots).toBe(1);
    expect(jobs.get("12347")?.arrayTaskId).toBe("1-10:1");
  });

  it("keys single array tasks as base.task", () => {
    const jobs = parseQstatPlain(
      [
        "job-ID  prior   name       user         state submit/start at     queue                          slots ja-task-ID",
        "-----------------------------------------------------------------------------------------------------------------",
        "    700 0.55500 sweep      alice        r     01/01/2024 10:00:00 all.q@node1                        1 1",
        "    700 0.55500 sweep      alice        r     01/01/2024 10:00:00 all.q@node2                        1 2"
      ].join("\n")
    );
    expect([...jobs.keys()]).toEqual(["700.1", "700.2"]);
    expect(jobs.get("700.2")?.queue).toBe("all.q@node2");
    expect(jobs.get("700.2")?.arrayTaskId).toBe("2");
  });
});

const QACCT = `==============================================================
qname        all.q
hostname     node1
owner        alice
jobname      align
jobnumber    12345
taskid       undefined
qsub_time    Mon Jan  1 09:00:00 2024
start_time   Mon Jan  1 10:00:00 2024
end_time     Mon Jan  1 11:00:00 2024
failed       0
exit_status  0
ru_wallclock 3600s
slots        4
category     -l h_vmem=16G,gpu=1 -pe smp 4
==============================================================
qname        all.q
hostname     node2
owner        bob
jobname      sort
jobnumber    12346
failed       100 : assumedly after job
exit_status  137
`;

describe("qacct parsing", () => {
  it("parses one record, skipping separators", () => {
    const record = parseQacct(QACCT.split("==============================================================\n")[1] ?? "");
    expect(record["jobnumber"]).toBe("12345");
    expect(record["qsub_time"]).toBe("Mon Jan  1 09:00:00 2024");
  });

  it("splits a multi-job dump", () => {
    const records = parseQacctRecords(QACCT);
    expect(records.map((r) => r["jobnumber"])).toEqual(["12345", "12346"]);
  });

  it("converts an accounting record", () => {
    const [record] = parseQacctRecords(QACCT);
    if (!record) throw new Error("missing record");
    const job = sgeAccountingToJobInfo(record);
    expect(job.status).toBe("COMPLETED");
    expect(job.runtimeSeconds).toBe(3600);
    expect(job.cpu).toBe(4);
    expect(job.memory).toBe("16G");
    expect(job.gpu).toBe(1);
    expect(job.exitCode).toBe(0);
    expect(job.node).toBe("node1");
    expect(job.arrayTaskId).toBeNull();
    expect(job.submitTime).toEqual(new Date(2024, 0, 1, 9, 0, 0));
    expect(job.endTime).toEqual(new Date(2024, 0, 1, 11, 0, 0));
  });

  it("reports array task accounting under the task id", () => {
    const job = sgeAccountingToJobInfo({ jobnumber: "700", taskid: "4", owner: "alice", failed: "0", exit_status: "0" });
    expect(job.jobId).toBe("700.4");
    expect(job.arrayTaskId).toBe("4");
  });

  it("derives accounting status from failed and exit_status", () => {
    expect(sgeAccountingStatus({ failed: "100 : assumedly after job", exit_status: "137" })).toBe("CANCELLED");
    expect(sgeAccountingStatus({ failed: "0", exit_status: "2" })).toBe("FAILED");
    expect(sgeAccountingStatus({})).toBe("UNKNOWN");
  });
});

describe("qstat -j detail", () => {
  it("extracts paths, predecessors and resources", () => {
    const detail = parseQstatJobDetail(
      [
        "==============================================================",
        "job_number:                 12345",
        "stdout_path_list:           NONE:node1:/home/alice/align.out",
        "stderr_path_list:           NONE:node1:/home/alice/align.err",
        "hard resource_list:         h_vmem=16G,gpu=2",
        "parallel environment:       smp range: 4",
        "jid_predecessor_list:       12340,12341"
      ].join("\n")
    );
    expect(sgeDetailFields(detail)).toEqual({
      stdoutPath: "/home/alice/align.out",
      stderrPath: "/home/alice/align.err",
      dependencies: ["12340", "12341"],
      memory: "16G",
      gpu: 2,
      cpu: 4
    });
  });
});

describe("sgeStateToStatus", () => {
  it("maps codes case-insensitively", () => {
    expect(sgeStateToStatus("r")).toBe("RUNNING");
    expect(sgeStateToStatus("Rr")).toBe("RUNNING");
    expect(sgeStateToStatus("hqw")).toBe("PENDING");
    expect(sgeStateToStatus("Eqw")).toBe("FAILED");
    expect(sgeStateToStatus("dr")).toBe("CANCELLED");
    expect(sgeStateToStatus("s")).toBe("PENDING");
    expect(sgeStateToStatus("zz")).toBe("UNKNOWN");
  });
});

describe("parseQsubOutput", () => {
  it("reads single and array submissions", () => {
    expect(parseQsubOutput('Your job 12345 ("align") has been submitted')).toBe("12345");
    expect(parseQsubOutput('Your job-array 9000.1-10:1 ("sweep") has been submitted')).toBe("9000");
    expect(parseQsubOutput("Unable to run job: denied")).toBeNull();
  });
});
