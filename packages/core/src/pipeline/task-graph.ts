/**
 * Task Graph
 *
 * Runs the stages of one job as a dependency graph: a task starts as soon as
 * every task it depends on has succeeded, so independent stages (geometry
 * cleaning and attribute normalization) run side by side.
 *
 * Tasks can only depend on handles returned by earlier `add` calls, which
 * keeps the graph acyclic and the insertion order topological.
 *
 * @example
 * ```typescript
 * const graph = new TaskGraph();
 * const read = graph.add('read', [], () => readLayer(request, scratch));
 * const clean = graph.add('clean', [read], async () => cleanGeometries(read.value()));
 * await graph.execute();
 * clean.value();
 * ```
 */

export interface TaskHandle<T> {
  readonly name: string;
  /**
   * Result of the task
   *
   * @throws Error if the task has not completed successfully
   */
  value(): T;
}

interface TaskEntry {
  readonly name: string;
  readonly dependsOn: readonly string[];
  readonly run: () => Promise<void>;
}

export class TaskGraph {
  private readonly tasks: TaskEntry[] = [];
  private readonly completed: string[] = [];
  private executed = false;

  /**
   * Register a task. `run` may read `value()` of its dependencies.
   */
  add<T>(name: string, dependsOn: readonly TaskHandle<unknown>[], run: () => Promise<T>): TaskHandle<T> {
    if (this.tasks.some((task) => task.name === name)) {
      throw new Error(`Duplicate task name: ${name}`);
    }
    if (this.executed) {
      throw new Error(`Cannot add task '${name}' after execution started`);
    }

    let state: { readonly done: true; readonly value: T } | { readonly done: false } = { done: false };
    this.tasks.push({
      name,
      dependsOn: dependsOn.map((dep) => dep.name),
      run: async () => {
        state = { done: true, value: await run() };
        this.completed.push(name);
      },
    });

    return {
      name,
      value: () => {
        if (!state.done) throw new Error(`Task '${name}' has not completed`);
        return state.value;
      },
    };
  }

  /**
   * Names of tasks in the order they completed
   */
  get completionOrder(): readonly string[] {
    return this.completed;
  }

  /**
   * Run every task, waiting for all started tasks to settle
   *
   * A task whose dependency failed never starts. When tasks fail, the error
   * of the earliest registered failing task is thrown.
   */
  async execute(): Promise<void> {
    if (this.executed) throw new Error('Task graph already executed');
    this.executed = true;

    const promises = new Map<string, Promise<void>>();
    for (const task of this.tasks) {
      const dependencies = task.dependsOn.map((name) => promises.get(name) ?? Promise.resolve());
      promises.set(
        task.name,
        Promise.all(dependencies).then(() => task.run())
      );
    }

    const outcomes = await Promise.allSettled(promises.values());
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') throw outcome.reason;
    }
  }
}
