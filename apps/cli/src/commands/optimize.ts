import { Args, Command, Flags } from "@oclif/core";
import { getLogger, loadBaseConfig, runAnalysis } from "@jobgraph/core";
import { optimizeDependencies, type OptimizeResult } from "@jobgraph/dag";
import { formatOptimizeSummary } from "../format.js";
import { loadJobMap } from "../load-job-map.js";

export default class Optimize extends Command {
  static override args = {
    file: Args.string({
      description: "Path to a JSON job map, or a workflow document with a `jobs` key",
      required: true,
    }),
  };

  static override description =
    "Rewrite job dependencies: drop redundant needs and edges that serialize parallel jobs";

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
    const { args, flags } = await this.parse(Optimize);

    let result: OptimizeResult;
    try {
      getLogger({ level: loadBaseConfig().logLevel });
      const jobs = loadJobMap(args.file);
      result = runAnalysis(`cli-${Date.now()}`, () => optimizeDependencies(jobs));
    } catch (error) {
      if (error instanceof Error) {
        this.error(`Optimization failed: ${error.message}`);
      }
      throw error;
    }

    if (flags.output === "json") {
      this.log(JSON.stringify(result, null, 2));
      return;
    }
    for (const line of formatOptimizeSummary(result)) {
      this.log(line);
    }
  }
}
