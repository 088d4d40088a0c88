import fs from "node:fs";
import {
  decode,
  decodeAll,
  encode,
  fromJSON,
  toJSON,
  type JsonValue,
} from "./bencode";

const args = process.argv;

const USAGE = `usage:
  decode <bencoded>   decode the argument and print it as JSON
  inspect <file>      decode the start of a file and report the bytes it took
  encode <json>       encode a JSON document as bencode`;

switch (args[2]) {
  case "decode": {
    run(handleDecodeCommand);
    break;
  }
  case "inspect": {
    run(handleInspectCommand);
    break;
  }
  case "encode": {
    run(handleEncodeCommand);
    break;
  }
  default: {
    console.error(USAGE);
    process.exitCode = 2;
  }
}

function handleDecodeCommand(input: string) {
  const decoded = decodeAll(Buffer.from(input));
  console.log(JSON.stringify(toJSON(decoded)));
}

function handleInspectCommand(path: string) {
  const payload = fs.readFileSync(path);
  const { value, consumed } = decode(payload);

  console.log(JSON.stringify(toJSON(value), null, 2));
  console.log(`Consumed: ${consumed} of ${payload.length} bytes`);
}

function handleEncodeCommand(input: string) {
  const json: JsonValue = JSON.parse(input);
  console.log(Buffer.from(encode(fromJSON(json))).toString("latin1"));
}

function run(command: (arg: string) => void) {
  const arg = args[3];
  if (arg === undefined) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  try {
    command(arg);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
