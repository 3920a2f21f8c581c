import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from "@nestjs/common";
import { Observable, map } from "rxjs";
import { bigIntToDecimalString } from "../../../../libs/staking-vault/src/utils/big-number-serialization";

/** Serializes bigint fields of every response as decimal strings. */
@Injectable()
export class BigIntInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    return next.handle().pipe(map(data => bigIntToDecimalString(data)));
  }
}
