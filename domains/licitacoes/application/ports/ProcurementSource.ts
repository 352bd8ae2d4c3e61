import type { RawRecord } from '../../domain/RawRecord';

export interface FetchPageParams {
  /** YYYYMMDD */
  dataInicial: string;
  /** YYYYMMDD */
  dataFinal: string;
  codigoModalidade: number;
  pagina: number;
  tamanhoPagina: number;
}

export interface SourcePage {
  records: RawRecord[];
  hasNextPage: boolean;
  totalRecords: number;
  totalPages: number;
}

/**
* A paginated procurement data source.
*
* Implementations throw SourceUnavailableError for transport failures and
* SourceSchemaError for responses they cannot interpret.
*/
export interface ProcurementSource {
  fetchPage(params: FetchPageParams, signal?: AbortSignal): Promise<SourcePage>;
}
