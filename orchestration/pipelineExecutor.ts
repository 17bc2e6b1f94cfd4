import { attempt, describeError } from "../shared/outcome.js";
import { silentDiagnostics, type DiagnosticsSink } from "./diagnostics.js";
import { RunLedger } from "./runLedger.js";
import { orderTasks } from "./taskScheduler.js";
import type {
  CreativeGenerator,
  CreativeRecord,
  CreativeSampleSource,
  Hypothesis,
  HypothesisEvaluator,
  HypothesisGenerator,
  InsightRecord,
  RunLedgerSnapshot,
  Task,
  TimeSeriesProvider,
  ValidationResult,
} from "./types.js";

const COMPONENT = "executor";

export interface CreativeSettings {
  readonly eligibleDrivers: readonly string[];
  readonly sampleSize: number;
  readonly variations: number;
}

export const DEFAULT_CREATIVE_SETTINGS: CreativeSettings = {
  eligibleDrivers: ["creative_fatigue"],
  sampleSize: 20,
  variations: 4,
};

export interface PipelineCollaborators {
  readonly hypothesisGenerator: HypothesisGenerator;
  readonly evaluator: HypothesisEvaluator;
  readonly timeSeries: TimeSeriesProvider;
  readonly creativeGenerator: CreativeGenerator;
  readonly creativeSamples: CreativeSampleSource;
  readonly diagnostics?: DiagnosticsSink;
  readonly creative?: CreativeSettings;
}

export interface PipelineResult {
  readonly results: readonly InsightRecord[];
  readonly creatives: readonly CreativeRecord[];
  readonly ledger: RunLedgerSnapshot;
}

/**
 * Runs ordered tasks one at a time: generate hypotheses, validate each, and ask
 * for creatives when a creative-eligible driver is validated. A failing
 * collaborator only costs its own task or hypothesis; it lands in the ledger.
 */
export class PipelineExecutor {
  private readonly diagnostics: DiagnosticsSink;
  private readonly creative: CreativeSettings;

  constructor(private readonly collaborators: PipelineCollaborators) {
    this.diagnostics = collaborators.diagnostics ?? silentDiagnostics;
    this.creative = collaborators.creative ?? DEFAULT_CREATIVE_SETTINGS;
  }

  async run(tasks: readonly Task[]): Promise<PipelineResult> {
    const ledger = new RunLedger();
    const results: InsightRecord[] = [];
    const creatives: CreativeRecord[] = [];

    const ordered = orderTasks(tasks, this.diagnostics);
    this.diagnostics.info(COMPONENT, "run:start", "Pipeline started", { taskCount: ordered.length });

    for (const task of ordered) {
      ledger.recordTaskExecuted(task);
      this.diagnostics.info(COMPONENT, "task:start", `Running task ${task.id}`, {
        taskId: task.id,
        scope: task.scope,
        priority: task.priority,
      });

      const hypotheses = await this.generateHypotheses(task, ledger);

      for (const hypothesis of hypotheses) {
        const result = await this.evaluate(task, hypothesis, ledger);
        results.push({
          ...result,
          task_id: task.id,
          hypothesis_text: hypothesis.hypothesis,
          supporting_data_points: hypothesis.supporting_data_points,
        });

        if (result.status === "VALIDATED" && this.creative.eligibleDrivers.includes(result.driver)) {
          creatives.push(...(await this.generateCreatives(task, hypothesis, ledger)));
        }
      }
    }

    const snapshot = ledger.snapshot();
    this.diagnostics.info(COMPONENT, "run:complete", "Pipeline finished", {
      tasks: snapshot.tasks_executed.length,
      results: results.length,
      creatives: creatives.length,
      errors: snapshot.errors.length,
    });

    return { results, creatives, ledger: snapshot };
  }

  private async generateHypotheses(task: Task, ledger: RunLedger): Promise<readonly Hypothesis[]> {
    const outcome = await attempt(() => this.collaborators.hypothesisGenerator.generate(task));
    if (outcome.ok) {
      this.diagnostics.debug(COMPONENT, "task:hypotheses", "Hypotheses generated", {
        taskId: task.id,
        count: outcome.value.length,
      });
      return outcome.value;
    }

    ledger.recordError("insight", outcome.reason, { taskId: task.id });
    this.diagnostics.warn(COMPONENT, "task:insight_failed", "Hypothesis generation failed", {
      taskId: task.id,
      error: outcome.reason,
    });
    return [];
  }

  private async evaluate(
    task: Task,
    hypothesis: Hypothesis,
    ledger: RunLedger,
  ): Promise<ValidationResult> {
    try {
      return await this.collaborators.evaluator.validate(
        hypothesis,
        this.collaborators.timeSeries,
        task.scope,
      );
    } catch (error) {
      const message = describeError(error);
      ledger.recordError("evaluation", message, { taskId: task.id, hypothesisId: hypothesis.id });
      this.diagnostics.error(COMPONENT, "hypothesis:evaluation_failed", "Evaluator threw", {
        taskId: task.id,
        hypothesisId: hypothesis.id,
        error: message,
      });
      return {
        hypothesis_id: hypothesis.id,
        driver: hypothesis.driver,
        validation: { error: message },
        evidence: null,
        impact: "low",
        confidence_final: 0,
        status: "INCONCLUSIVE",
        notes: `Evaluator failure: ${message}`,
      };
    }
  }

  private async generateCreatives(
    task: Task,
    hypothesis: Hypothesis,
    ledger: RunLedger,
  ): Promise<readonly CreativeRecord[]> {
    const context = { taskId: task.id, hypothesisId: hypothesis.id };

    const sample = await attempt(() =>
      this.collaborators.creativeSamples.getCreativeSample(this.creative.sampleSize),
    );
    if (!sample.ok) {
      ledger.recordError("creative", `creative sample unavailable: ${sample.reason}`, context);
      this.diagnostics.warn(COMPONENT, "creative:sample_failed", "Creative sample unavailable", {
        ...context,
        error: sample.reason,
      });
      return [];
    }

    const generated = await attempt(() =>
      this.collaborators.creativeGenerator.generateForCampaign(
        task.scope,
        sample.value,
        this.creative.variations,
      ),
    );
    if (!generated.ok) {
      ledger.recordError("creative", generated.reason, context);
      this.diagnostics.warn(COMPONENT, "creative:generation_failed", "Creative generation failed", {
        ...context,
        error: generated.reason,
      });
      return [];
    }

    this.diagnostics.info(COMPONENT, "creative:generated", "Creatives generated", {
      ...context,
      scope: task.scope,
      count: generated.value.length,
    });
    return generated.value;
  }
}
