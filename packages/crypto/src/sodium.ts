/**
 * libsodium bootstrap. Every primitive that touches the wasm module awaits
 * this first; concurrent callers share one readiness promise.
 * @module sodium
 */
import sodium from "libsodium-wrappers-sumo";

let ready: Promise<typeof sodium> | null = null;

export async function initSodium(): Promise<typeof sodium> {
  if (!ready) {
    ready = sodium.ready.then(() => sodium);
  }
  return ready;
}
