import { ConversionTask, NewConversionTask } from "../entities/conversion-task";
import { TaskStatus } from "../enums/task.status";
import { TaskOrdering } from "../utils/pagination";

export interface TaskListQuery {
  status?: TaskStatus;
  targetFormat?: string;
  ordering: TaskOrdering;
  skip: number;
  limit: number;
}

export interface TaskListPage {
  items: ConversionTask[];
  total: number;
}

export interface IConversionTaskRepository {
  create(input: NewConversionTask): Promise<ConversionTask>;
  findById(id: string): Promise<ConversionTask | null>;
  findByIds(ids: string[]): Promise<ConversionTask[]>;
  update(id: string, updates: Partial<ConversionTask>): Promise<ConversionTask | null>;
  /** Applies the update only while the task is in one of `statuses`; null otherwise. */
  updateIfStatus(
    id: string,
    statuses: readonly TaskStatus[],
    updates: Partial<ConversionTask>
  ): Promise<ConversionTask | null>;
  delete(id: string): Promise<boolean>;
  list(query: TaskListQuery): Promise<TaskListPage>;
  findCompletedBefore(statuses: readonly TaskStatus[], before: Date): Promise<ConversionTask[]>;
  findRecentOrActive(since: Date, limit: number): Promise<ConversionTask[]>;
  countByStatus(): Promise<Record<TaskStatus, number>>;
}
