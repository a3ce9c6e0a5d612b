/* eslint no-console: "off" */

import Benchmark from "benchmark";
import { randomInteger } from "@booth-uint/common/random";
import { UInt } from "@booth-uint/uint";

const OPERAND_BITS = [8, 32, 128];

const suite = new Benchmark.Suite("UInt operations");

for (const bits of OPERAND_BITS) {
  const a = UInt.from(randomInteger(bits));
  const b = UInt.from(randomInteger(bits));

  suite.add(`and (${bits} bits)`, () => {
    UInt.and(a, b);
  });

  suite.add(`add (${bits} bits)`, () => {
    UInt.add(a, b);
  });

  suite.add(`sub (${bits} bits)`, () => {
    UInt.sub(a, b);
  });

  suite.add(`mul (${bits} bits)`, () => {
    UInt.mul(a, b);
  });
}

suite.on("cycle", (event: Benchmark.Event) => {
  console.log(String(event.target));
});

suite.run();
