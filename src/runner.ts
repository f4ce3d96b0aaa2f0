/**
 * @module
 * Executes an execution plan.
 */
import {
    DependencyStore,
} from './db';
import {
    ActionError,
    DependencyFailed,
} from './errors';
import {
    EXIT_SUCCESS,
    EXIT_TASK_FAILED,
} from './exitCodes';
import {
    CapturedOutput,
    Reporter,
} from './reporter';
import {
    indexTasks,
} from './selector';
import {
    ActionContext,
    DEFAULT_VERBOSITY,
    OutputWriter,
    Task,
    Verbosity,
} from './task';

/**
 * Options for {@link Runner}
 */
export interface RunOptions {
    /** Output verbosity. Tasks may override it. Default: {@link DEFAULT_VERBOSITY}. */
    verbosity?: Verbosity;
    /** Execute tasks even if they are up-to-date or ignored. */
    alwaysExecute?: boolean;
    /** Keep running independent tasks after a failure. */
    continueOnError?: boolean;
    /**
     * Maximum number of tasks that can be run concurrently at any time.
     * Default: `1`.
     */
    maxWorkers?: number;
}

/**
 * Final state of a task in a run.
 */
export type TaskResult = 'success' | 'failure' | 'up-to-date' | 'ignore';

class GraphNode {
    task: Task;
    order: number; // position in the plan
    children: Set<GraphNode>; // tasks depending on this one
    parents: Set<GraphNode>; // unfinished task dependencies

    constructor(task: Task, order: number) {
        this.task = task;
        this.order = order;
        this.children = new Set();
        this.parents = new Set();
    }
}

/**
 * Tasks of the plan that did not finish yet. A root node has no unfinished task dependency.
 */
class Graph {
    private nodes: Map<string, GraphNode>;
    /** Graph nodes with no incoming edges. */
    private rootNodes: Set<GraphNode>;

    constructor(plan: readonly Task[]) {
        this.nodes = new Map();
        this.rootNodes = new Set();
        for (const [i, task] of plan.entries()) {
            const node = new GraphNode(task, i);
            this.nodes.set(task.name, node);
            this.rootNodes.add(node);
        }
        for (const node of this.nodes.values()) {
            for (const name of node.task.taskDep) {
                const parent = this.nodes.get(name);
                if (parent)
                    this.addEdge(parent, node);
            }
        }
    }

    hasRootNodes(): boolean {
        return this.rootNodes.size > 0;
    }

    getRootNodes(): IterableIterator<GraphNode> {
        return this.rootNodes.values();
    }

    addEdge(src: GraphNode, dst: GraphNode): void {
        src.children.add(dst);
        dst.parents.add(src);
        this.rootNodes.delete(dst);
    }

    deleteNode(node: GraphNode): void {
        if (node.parents.size)
            throw new Error('Node has parents');
        for (const dst of node.children) {
            dst.parents.delete(node);
            if (!dst.parents.size)
                this.rootNodes.add(dst);
        }
        this.nodes.delete(node.task.name);
        this.rootNodes.delete(node);
    }
}

interface FinishedWorkerResult {
    status: 'finished';
    graphNode: GraphNode;
    result: TaskResult;
}

interface CrashedWorkerResult {
    status: 'crashed';
    graphNode: GraphNode;
    error: unknown;
}

type WorkerResult = FinishedWorkerResult | CrashedWorkerResult;

/**
 * Buffers the output of one task execution, or forwards it to the reporter, depending on verbosity.
 */
class OutputCapture {
    private readonly stdout: Buffer[];
    private readonly stderr: Buffer[];
    private readonly reporter: Reporter;
    private readonly verbosity: Verbosity;

    constructor(reporter: Reporter, verbosity: Verbosity) {
        this.stdout = [];
        this.stderr = [];
        this.reporter = reporter;
        this.verbosity = verbosity;
    }

    context(taskName: string): ActionContext {
        const stdout: OutputWriter = this.verbosity < 2 ?
            { write: chunk => this.stdout.push(toBuffer(chunk)) } :
            { write: chunk => this.reporter.writeStdout(chunk) };
        const stderr: OutputWriter = this.verbosity < 2 ?
            { write: chunk => this.stderr.push(toBuffer(chunk)) } :
            { write: chunk => this.reporter.writeStderr(chunk) };
        return { stderr, stdout, taskName };
    }

    captured(): CapturedOutput {
        return {
            stderr: Buffer.concat(this.stderr).toString(),
            stdout: Buffer.concat(this.stdout).toString(),
        };
    }
}

/**
 * Runs the tasks of a plan, skipping the ones the dependency store reports as up-to-date or ignored.
 */
export class Runner {
    /** Result of every task that was processed by the last {@link run}. */
    readonly results: Map<string, TaskResult>;
    private readonly store: DependencyStore;
    private readonly reporter: Reporter;
    private readonly options: RunOptions;
    private readonly maxWorkers: number;
    private graph: Graph;
    private tasks: ReadonlyMap<string, Task>;
    private workers: Map<GraphNode, Promise<WorkerResult>>;
    private failed: Set<string>;

    constructor(store: DependencyStore, reporter: Reporter, options?: RunOptions) {
        this.store = store;
        this.reporter = reporter;
        this.options = options || {};
        this.maxWorkers = Math.max(1, this.options.maxWorkers || 1);
        this.results = new Map();
        this.graph = new Graph([]);
        this.tasks = new Map();
        this.workers = new Map();
        this.failed = new Set();
    }

    /**
     * Runs `plan`, which must list every task after its task dependencies.
     * Returns the process exit code.
     */
    async run(plan: readonly Task[]): Promise<number> {
        this.results.clear();
        this.failed = new Set();
        this.workers = new Map();
        this.tasks = indexTasks(plan);
        this.graph = new Graph(plan);

        let stopped = false;
        while (true) {
            if (!stopped)
                this.fillUpWorkers();
            if (!this.workers.size)
                break;
            const result = await Promise.race(this.workers.values());
            this.workers.delete(result.graphNode);
            if (result.status === 'crashed') {
                // let running tasks finish and report what is known, then give up
                await Promise.all(this.workers.values());
                this.reporter.completeRun();
                throw result.error;
            }
            this.graph.deleteNode(result.graphNode);
            this.results.set(result.graphNode.task.name, result.result);
            if (result.result === 'failure') {
                this.failed.add(result.graphNode.task.name);
                if (!this.options.continueOnError)
                    stopped = true;
            }
        }

        this.reporter.completeRun();
        return this.failed.size ? EXIT_TASK_FAILED : EXIT_SUCCESS;
    }

    /**
     * Add as many workers as we can.
     */
    private fillUpWorkers(): void {
        while (this.graph.hasRootNodes() && this.workers.size < this.maxWorkers) {
            const graphNode = this.findAvailableGraphNode();
            if (!graphNode)
                break;

            const failedDep = graphNode.task.taskDep.find(name => this.failed.has(name));
            if (failedDep !== undefined) {
                this.skipFailedDependency(graphNode, failedDep);
                continue;
            }
            this.workers.set(graphNode, this.runNode(graphNode));
        }
    }

    /**
     * Find the first graphNode in plan order that is a root node but is not being processed.
     * Returns undefined if such graph node could not be found.
     */
    private findAvailableGraphNode(): GraphNode | undefined {
        let found: GraphNode | undefined;
        for (const graphNode of this.graph.getRootNodes()) {
            if (this.workers.has(graphNode))
                continue;
            if (!found || graphNode.order < found.order)
                found = graphNode;
        }
        return found;
    }

    private skipFailedDependency(graphNode: GraphNode, dependency: string): void {
        const task = graphNode.task;
        this.reporter.addFailure(task, new DependencyFailed(task.name, dependency), { stderr: '', stdout: '' });
        this.graph.deleteNode(graphNode);
        this.results.set(task.name, 'failure');
        this.failed.add(task.name);
    }

    private async runNode(graphNode: GraphNode): Promise<WorkerResult> {
        try {
            const result = await this.runTask(graphNode.task);
            return { graphNode, result, status: 'finished' };
        } catch (error) {
            return { error, graphNode, status: 'crashed' };
        }
    }

    private async runTask(task: Task): Promise<TaskResult> {
        if (!this.options.alwaysExecute) {
            const status = await this.store.getStatus(task, this.tasks);
            if (status === 'ignore') {
                this.reporter.skipIgnore(task);
                return 'ignore';
            }
            if (status === 'up-to-date') {
                this.reporter.skipUptodate(task);
                return 'up-to-date';
            }
        }

        this.reporter.executeTask(task);
        const verbosity = task.verbosity ?? this.options.verbosity ?? DEFAULT_VERBOSITY;
        const capture = new OutputCapture(this.reporter, verbosity);
        try {
            const ctx = capture.context(task.name);
            for (const action of task.actions)
                await action.execute(ctx);
            const fingerprints = await this.store.computeFingerprints(task);
            this.store.commit(task, fingerprints);
        } catch (error) {
            if (!(error instanceof ActionError))
                throw error;
            this.reporter.addFailure(task, error, capture.captured());
            return 'failure';
        }
        this.reporter.addSuccess(task);
        return 'success';
    }
}

function toBuffer(chunk: string | Buffer): Buffer {
    return typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
}
