/**
* Normalized fields of a procurement notice, as produced by the normalizer
* and written by an upsert.
*/
export interface LicitacaoInput {
  externalId: string;
  objetoCompra: string;
  informacaoComplementar: string | null;
  orgao: string;
  orgaoCnpj: string | null;
  modalidade: string;
  codigoModalidade: number | null;
  uf: string | null;
  municipio: string | null;
  valorEstimado: number | null;
  dataAberturaProposta: Date | null;
  dataEncerramentoProposta: Date | null;
  dataPublicacao: Date | null;
  situacao: string | null;
  linkSistemaOrigem: string | null;
  rawPayload: Record<string, unknown>;
}

export interface LicitacaoProps extends LicitacaoInput {
  internalId: number;
  syncedAt: Date;
  indexedAt: Date | null;
}

/**
* Search-result projection of a notice
*/
export interface LicitacaoSummary {
  id: number;
  externalId: string;
  objetoCompra: string;
  orgao: string;
  modalidade: string;
  uf: string | null;
  municipio: string | null;
  valorEstimado: number | null;
  dataAberturaProposta: string | null;
  dataPublicacao: string | null;
  situacao: string | null;
}

/**
* Licitacao - Immutable domain entity for a stored procurement notice
*
* `internalId` is assigned by the system of record on first insert and
* never changes; it doubles as the search document id.
*/
export class Licitacao {
  private constructor(private readonly props: Readonly<LicitacaoProps>) {}

  /**
  * Create from a freshly upserted row
  */
  static create(input: LicitacaoInput, internalId: number, syncedAt: Date): Licitacao {
    if (!Number.isInteger(internalId) || internalId < 1) {
      throw new Error('internalId must be a positive integer');
    }
    return new Licitacao({ ...input, internalId, syncedAt, indexedAt: null });
  }

  /**
  * Reconstitute from persistence
  */
  static reconstitute(props: LicitacaoProps): Licitacao {
    return new Licitacao({ ...props });
  }

  get internalId(): number { return this.props.internalId; }
  get externalId(): string { return this.props.externalId; }
  get objetoCompra(): string { return this.props.objetoCompra; }
  get informacaoComplementar(): string | null { return this.props.informacaoComplementar; }
  get orgao(): string { return this.props.orgao; }
  get orgaoCnpj(): string | null { return this.props.orgaoCnpj; }
  get modalidade(): string { return this.props.modalidade; }
  get codigoModalidade(): number | null { return this.props.codigoModalidade; }
  get uf(): string | null { return this.props.uf; }
  get municipio(): string | null { return this.props.municipio; }
  get valorEstimado(): number | null { return this.props.valorEstimado; }
  get dataAberturaProposta(): Date | null { return this.props.dataAberturaProposta; }
  get dataEncerramentoProposta(): Date | null { return this.props.dataEncerramentoProposta; }
  get dataPublicacao(): Date | null { return this.props.dataPublicacao; }
  get situacao(): string | null { return this.props.situacao; }
  get linkSistemaOrigem(): string | null { return this.props.linkSistemaOrigem; }
  get rawPayload(): Record<string, unknown> { return this.props.rawPayload; }
  get syncedAt(): Date { return this.props.syncedAt; }
  get indexedAt(): Date | null { return this.props.indexedAt; }

  /**
  * Create a copy marked as indexed (immutable update)
  */
  markIndexed(at: Date): Licitacao {
    return new Licitacao({ ...this.props, indexedAt: at });
  }

  /**
  * True while the latest upsert has not reached the search index
  */
  isIndexLagging(): boolean {
    return this.props.indexedAt === null || this.props.indexedAt < this.props.syncedAt;
  }

  toSummary(): LicitacaoSummary {
    return {
      id: this.props.internalId,
      externalId: this.props.externalId,
      objetoCompra: this.props.objetoCompra,
      orgao: this.props.orgao,
      modalidade: this.props.modalidade,
      uf: this.props.uf,
      municipio: this.props.municipio,
      valorEstimado: this.props.valorEstimado,
      dataAberturaProposta: this.props.dataAberturaProposta?.toISOString() ?? null,
      dataPublicacao: this.props.dataPublicacao?.toISOString() ?? null,
      situacao: this.props.situacao,
    };
  }

  /**
  * Full record as served by GET /licitacoes/:internalId
  */
  toJSON(): Record<string, unknown> {
    return {
      ...this.toSummary(),
      informacaoComplementar: this.props.informacaoComplementar,
      orgaoCnpj: this.props.orgaoCnpj,
      codigoModalidade: this.props.codigoModalidade,
      dataEncerramentoProposta: this.props.dataEncerramentoProposta?.toISOString() ?? null,
      linkSistemaOrigem: this.props.linkSistemaOrigem,
      rawPayload: this.props.rawPayload,
      syncedAt: this.props.syncedAt.toISOString(),
      indexedAt: this.props.indexedAt?.toISOString() ?? null,
    };
  }
}
