import { ConversionHistory } from "../../domain/entities/conversion-history";
import { EngineType, isEngineType } from "../../domain/enums/engine.type";
import { HistoryFilter, IConversionHistoryRepository } from "../../domain/interfaces/iconversion-history.repository";
import { HistoryPeriod, parseHistoryPeriod, periodStart } from "../../domain/utils/conversion-history.stats";
import { PaginationInfo, buildPagination, parsePageRequest } from "../../domain/utils/pagination";
import { extensionsForType } from "../../infrastructure/engines/engine.manager";

export interface GetConversionHistoryParams {
  page?: unknown;
  perPage?: unknown;
  fileType?: unknown;
  status?: unknown;
  search?: unknown;
  period?: unknown;
  now?: Date;
}

/** Filters as applied, echoed back to the caller. */
export interface AppliedHistoryFilters {
  fileType: EngineType | null;
  status: ConversionHistory["status"] | null;
  search: string | null;
  period: HistoryPeriod;
}

export interface GetConversionHistoryResult {
  entries: ConversionHistory[];
  pagination: PaginationInfo;
  filters: AppliedHistoryFilters;
}

export class GetConversionHistoryUseCase {
  constructor(private historyRepository: IConversionHistoryRepository) {}

  async execute(params: GetConversionHistoryParams): Promise<GetConversionHistoryResult> {
    const pageRequest = parsePageRequest(params.page, params.perPage);
    const fileType = isEngineType(params.fileType) ? params.fileType : null;
    const status = params.status === "done" || params.status === "failed" ? params.status : null;
    const search = typeof params.search === "string" && params.search.trim() ? params.search.trim() : null;
    const period = parseHistoryPeriod(params.period);

    const filter: HistoryFilter = {
      inputFormats: fileType ? extensionsForType(fileType) : undefined,
      status: status ?? undefined,
      search: search ?? undefined,
      since: periodStart(period, params.now ?? new Date()),
    };
    const { items, total } = await this.historyRepository.list(
      filter,
      (pageRequest.page - 1) * pageRequest.perPage,
      pageRequest.perPage
    );
    return {
      entries: items,
      pagination: buildPagination(pageRequest, total),
      filters: { fileType, status, search, period },
    };
  }
}
