import { between, once } from "../utility";
import { text } from "../toolkit";

const digit = text.satisfy(char => char >= "0" && char <= "9", "a digit");

const dot = text.element(".");

export const octet = text
  .repeat(between(once, 3), digit)
  .chain<number>(digits => {
    const value = Number(digits.join(""));
    return value > 255
      ? text.fail(`Octet ${value} is out of range`)
      : text.pure(value);
  })
  .named("octet");

/**
 * Dotted-quad IPv4 address, yields its four octets
 */

export const ipv4 = text
  .sequence(octet, dot.then(octet), dot.then(octet), dot.then(octet))
  .named("ipv4");
