import { ConversionTask } from "../../domain/entities/conversion-task";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import {
  PaginationInfo,
  buildPagination,
  parsePageRequest,
  parseStatusFilter,
  parseTaskOrdering,
} from "../../domain/utils/pagination";

export interface ListTasksParams {
  page?: unknown;
  perPage?: unknown;
  status?: unknown;
  format?: unknown;
  order?: unknown;
}

export interface ListTasksResult {
  tasks: ConversionTask[];
  pagination: PaginationInfo;
}

export class ListTasksUseCase {
  constructor(private taskRepository: IConversionTaskRepository) {}

  async execute(params: ListTasksParams): Promise<ListTasksResult> {
    const pageRequest = parsePageRequest(params.page, params.perPage);
    const format = typeof params.format === "string" && params.format.trim() ? params.format.trim().toLowerCase() : undefined;

    const { items, total } = await this.taskRepository.list({
      status: parseStatusFilter(params.status),
      targetFormat: format,
      ordering: parseTaskOrdering(params.order),
      skip: (pageRequest.page - 1) * pageRequest.perPage,
      limit: pageRequest.perPage,
    });

    return { tasks: items, pagination: buildPagination(pageRequest, total) };
  }
}
