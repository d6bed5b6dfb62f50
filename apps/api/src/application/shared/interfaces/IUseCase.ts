/**
 * A single application operation. Controllers call `execute`
 * with a validated DTO and map thrown domain errors themselves.
 */
export interface IUseCase<TRequest, TResponse> {
  execute(request: TRequest): Promise<TResponse>;
}
