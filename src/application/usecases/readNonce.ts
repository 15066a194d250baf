import { ContractRuntime } from "../contractRuntime";

/**
 * Admin nonce lookup. Nothing in this contract increments or checks it, so it
 * offers no replay protection on its own.
 */
export class ReadNonceUseCase {
  constructor(private readonly runtime: ContractRuntime) {}

  async execute(): Promise<bigint> {
    return this.runtime.invoke(async (state) => state.readNonce(await state.readAdministrator()));
  }
}
