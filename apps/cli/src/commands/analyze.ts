import { Args, Command, Flags } from "@oclif/core";
import { getLogger, runAnalysis } from "@jobgraph/core";
import { analyzeJobs, loadAnalysisConfig, type AnalysisResult } from "@jobgraph/dag";
import { formatAnalysisSummary } from "../format.js";
import { loadJobMap } from "../load-job-map.js";

export default class Analyze extends Command {
  static override args = {
    file: Args.string({
      description: "Path to a JSON job map, or a workflow document with a `jobs` key",
      required: true,
    }),
  };

  static override description = "Analyze job dependencies: stages, critical path, issues and suggestions";

  static override examples = [
    "<%= config.bin %> <%= command.id %> workflow.json",
    "<%= config.bin %> <%= command.id %> workflow.json --output json",
  ];

  static override flags = {
    output: Flags.string({
      char: "o",
      description: "Output format",
      options: ["json", "summary"],
      default: "summary",
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Analyze);

    let result: AnalysisResult;
    try {
      const config = loadAnalysisConfig();
      getLogger({ level: config.logLevel });
      const jobs = loadJobMap(args.file);
      result = runAnalysis(`cli-${Date.now()}`, () => analyzeJobs(jobs, config));
    } catch (error) {
      if (error instanceof Error) {
        this.error(`Analysis failed: ${error.message}`);
      }
      throw error;
    }

    if (flags.output === "json") {
      this.log(JSON.stringify(result, null, 2));
      return;
    }
    for (const line of formatAnalysisSummary(result)) {
      this.log(line);
    }
  }
}
