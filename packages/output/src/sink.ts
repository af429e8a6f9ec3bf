import { fragmentToString, type Fragment } from "./fragment.js";

/** The rendering pipeline's raw output. Receives fragments in write order. */
export interface FragmentSink {
  write(fragment: Fragment): void;
}

/** Materializes fragments into one string. */
export class StringSink implements FragmentSink {
  private readonly parts: string[] = [];

  write(fragment: Fragment): void {
    this.parts.push(fragmentToString(fragment));
  }

  toString(): string {
    return this.parts.join("");
  }
}
