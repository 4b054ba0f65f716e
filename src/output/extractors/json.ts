import { captureAll, findJsonObjects, isRecord, stripCodeFences, tryParseJson } from '../common.js';

/**
 * JSON values embedded in a reply: fenced blocks first, then
 * brace-matched objects, then `Response:`-style labels.
 */
export class JsonExtractor {
  readonly defaultName = 'json_content';

  extract(response: unknown, outputName?: string): unknown {
    if (isRecord(response)) {
      const name = outputName ?? this.defaultName;
      return name in response ? response[name] : response;
    }
    if (typeof response !== 'string' || !response.trim()) return null;

    const whole = tryParseJson(stripCodeFences(response));
    if (whole !== undefined) return this.pick(whole, outputName);

    for (const block of captureAll(response, /```(?:json)?[ \t]*\n([\s\S]*?)\n?```/gi)) {
      const parsed = tryParseJson(block.trim());
      if (parsed !== undefined) return this.pick(parsed, outputName);
    }

    const objects = findJsonObjects(response).sort((a, b) => b.length - a.length);
    for (const candidate of objects) {
      const parsed = tryParseJson(candidate);
      if (parsed !== undefined) return this.pick(parsed, outputName);
    }

    for (const labelled of captureAll(response, /(?:Response|Result|Output):\s*(\{[\s\S]*\}|\[[\s\S]*\])/gi)) {
      const parsed = tryParseJson(labelled);
      if (parsed !== undefined) return this.pick(parsed, outputName);
    }
    return null;
  }

  /** A named value inside `results` wins over the whole document */
  private pick(value: unknown, outputName?: string): unknown {
    if (!outputName || !isRecord(value)) return value;
    const container = isRecord(value.results) ? value.results : value;
    return outputName in container ? container[outputName] : value;
  }
}
