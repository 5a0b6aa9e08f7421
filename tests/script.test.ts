import { describe, it, expect } from "vitest";
import {
  bashSingleQuote,
  formatDayTimeLimit,
  formatHourTimeLimit,
  renderJobScript,
  sanitizeJobName
} from "../src/schedulers/script.js";
import { SgeScheduler } from "../src/schedulers/sge/sgeScheduler.js";
import { SlurmScheduler } from "../src/schedulers/slurm/slurmScheduler.js";
import { PbsScheduler } from "../src/schedulers/pbs/pbsScheduler.js";
import { FakeRunner, schedulerDeps } from "./helpers/fakeRunner.js";

function directives(script: string, prefix: string): string[] {
  return script.split("\n").filter((line) => line.startsWith(prefix));
}

describe("script helpers", () => {
  it("quotes for bash", () => {
    expect(bashSingleQuote("plain")).toBe("'plain'");
    expect(bashSingleQuote("it's")).toBe(`'it'"'"'s'`);
  });

  it("formats time limits", () => {
    expect(formatDayTimeLimit(3600)).toBe("01:00:00");
    expect(formatDayTimeLimit(90061)).toBe("1-01:01:01");
    expect(formatHourTimeLimit(90061)).toBe("25:01:01");
    expect(() => formatDayTimeLimit(0)).toThrow(/invalid time limit/);
    expect(() => formatHourTimeLimit(1.5)).toThrow(/invalid time limit/);
  });

  it("sanitizes job names", () => {
    expect(sanitizeJobName("  my job!  ")).toBe("my_job_");
    expect(sanitizeJobName("42run")).toBe("j42run");
    expect(sanitizeJobName("   ")).toBe("job");
  });

  it("rejects bad env keys and empty commands", () => {
    expect(() => renderJobScript({ name: "x", command: "true", env: { "BAD-KEY": "1" } }, [])).toThrow(
      "invalid env var name: BAD-KEY"
    );
    expect(() => renderJobScript({ name: "x", command: "   " }, [])).toThrow("job command must be non-empty");
  });
});

describe("generated scripts", () => {
  const runner = new FakeRunner();

  it("renders a full SGE script", () => {
    const sge = new SgeScheduler(schedulerDeps(runner));
    const script = sge.generateScript({
      name: "align reads",
      command: "bwa mem ref.fa r.fq > out.sam\n",
      cpu: 4,
      memory: "16G",
      timeLimitSeconds: 90061,
      workdir: "/data/run1",
      env: { ZED: "it's", ALPHA: "1" },
      modules: ["bwa/0.7"],
      mergeOutput: true,
      dependencies: ["11", "12"]
    });

    expect(script).toBe(
      [
        "#!/usr/bin/env bash",
        "#$ -N align_reads",
        "#$ -S /bin/bash",
        "#$ -wd /data/run1",
        "#$ -pe smp 4",
        "#$ -l h_vmem=16G",
        "#$ -l h_rt=25:01:01",
        "#$ -j y",
        "#$ -hold_jid 11,12",
        "",
        "set -eo pipefail",
        "",
        "module load 'bwa/0.7'",
        "",
        "export ALPHA='1'",
        `export ZED='it'"'"'s'`,
        "",
        "cd '/data/run1'",
        "",
        "bwa mem ref.fa r.fq > out.sam",
        ""
      ].join("\n")
    );
  });

  it("uses the configured parallel environment and array throttling for SGE", () => {
    const sge = new SgeScheduler(schedulerDeps(runner), { parallelEnvironment: "mpi" });
    const script = sge.generateScript(
      { name: "sweep", command: "run", cpu: 2, queue: "long.q", stderr: "/logs/err" },
      { job: { name: "sweep", command: "run" }, start: 1, end: 9, step: 2, maxConcurrent: 2 }
    );
    expect(directives(script, "#$")).toEqual([
      "#$ -N sweep",
      "#$ -S /bin/bash",
      "#$ -cwd",
      "#$ -pe mpi 2",
      "#$ -q long.q",
      "#$ -e /logs/err",
      "#$ -t 1-9:2",
      "#$ -tc 2"
    ]);
  });

  it("renders Slurm directives with task-form dependencies", () => {
    const slurm = new SlurmScheduler(schedulerDeps(runner));
    const job = {
      name: "sweep",
      command: "run $SLURM_ARRAY_TASK_ID",
      gpu: 1,
      queue: "short",
      stdout: "/o/%A_%a.out",
      dependencies: ["7.2"]
    };
    const script = slurm.generateScript(job, { job, start: 1, end: 10, step: 2, maxConcurrent: 3 });
    expect(directives(script, "#SBATCH")).toEqual([
      "#SBATCH --job-name=sweep",
      "#SBATCH --gres=gpu:1",
      "#SBATCH --partition=short",
      "#SBATCH --output=/o/%A_%a.out",
      "#SBATCH --dependency=afterok:7_2",
      "#SBATCH --array=1-10:2%3"
    ]);
  });

  it("renders Slurm resources and skips --error when merged", () => {
    const slurm = new SlurmScheduler(schedulerDeps(runner));
    const script = slurm.generateScript({
      name: "fit",
      command: "./fit.sh --epochs 3",
      cpu: 8,
      memory: "32G",
      timeLimitSeconds: 5400,
      workdir: "/scratch/fit",
      stderr: "/scratch/fit/err.log",
      mergeOutput: true
    });
    expect(directives(script, "#SBATCH")).toEqual([
      "#SBATCH --job-name=fit",
      "#SBATCH --cpus-per-task=8",
      "#SBATCH --mem=32G",
      "#SBATCH --time=01:30:00",
      "#SBATCH --chdir=/scratch/fit"
    ]);
  });

  it("renders PBS directives", () => {
    const pbs = new PbsScheduler(schedulerDeps(runner));
    const job = {
      name: "x",
      command: "true",
      cpu: 2,
      memory: "8G",
      timeLimitSeconds: 7200,
      stderr: "/e",
      dependencies: ["5.1"]
    };
    const script = pbs.generateScript(job, { job, start: 0, end: 4 });
    expect(directives(script, "#PBS")).toEqual([
      "#PBS -N x",
      "#PBS -S /bin/bash",
      "#PBS -l ncpus=2",
      "#PBS -l mem=8gb",
      "#PBS -l walltime=02:00:00",
      "#PBS -e /e",
      "#PBS -W depend=afterok:5[1]",
      "#PBS -J 0-4:1"
    ]);
  });

  it("passes per-scheduler extra arguments to the submit command only", () => {
    const job = { name: "x", command: "true", schedulerArgs: { sge: ["-P", "proj"], slurm: ["--qos=low"] } };
    expect(new SgeScheduler(schedulerDeps(runner)).buildSubmitCommand(job)).toEqual(["qsub", "-P", "proj"]);
    expect(new SlurmScheduler(schedulerDeps(runner)).buildSubmitCommand(job)).toEqual([
      "sbatch",
      "--parsable",
      "--qos=low"
    ]);
    expect(new PbsScheduler(schedulerDeps(runner)).buildSubmitCommand(job)).toEqual(["qsub"]);
  });
});
