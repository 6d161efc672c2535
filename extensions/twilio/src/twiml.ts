/**
 * Minimal TwiML builder.
 *
 * A `Twiml` document is an append-only list of verbs rendered once inside a
 * single <Response> root:
 *
 *   new Twiml().message("You told me: 'hi'").toXml()
 *   // <?xml version="1.0" encoding="UTF-8"?><Response><Message>You told me: 'hi'</Message></Response>
 */

export type Voice = "man" | "woman";

export type TwimlVerb =
  | { verb: "Say"; text: string; voice: Voice; language: string }
  | { verb: "Message"; text: string }
  | { verb: "Play"; url: string; loop?: number }
  | { verb: "Redirect"; url: string; method?: "GET" | "POST" }
  | { verb: "Pause"; length?: number }
  | { verb: "Hangup" };

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// Control characters XML 1.0 has no way to represent, plus the two noncharacters.
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Escape element text. Quotes stay literal so message text reads as written;
 * characters XML cannot carry are dropped.
 */
export function escapeXmlText(value: string): string {
  return value
    .replace(XML_FORBIDDEN, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeXmlAttribute(value: string): string {
  return escapeXmlText(value).replace(/"/g, "&quot;");
}

function element(
  name: string,
  attributes: Array<[string, string | number | undefined]>,
  text?: string,
): string {
  const attrs = attributes
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escapeXmlAttribute(String(value))}"`)
    .join("");
  if (text === undefined) {
    return `<${name}${attrs}/>`;
  }
  return `<${name}${attrs}>${escapeXmlText(text)}</${name}>`;
}

export function renderVerb(node: TwimlVerb): string {
  switch (node.verb) {
    case "Say":
      return element(
        "Say",
        [
          ["voice", node.voice],
          ["language", node.language],
        ],
        node.text,
      );
    case "Message":
      return element("Message", [], node.text);
    case "Play":
      return element("Play", [["loop", node.loop]], node.url);
    case "Redirect":
      return element("Redirect", [["method", node.method]], node.url);
    case "Pause":
      return element("Pause", [["length", node.length]]);
    case "Hangup":
      return element("Hangup", []);
  }
}

export class Twiml {
  private readonly verbs: TwimlVerb[] = [];

  add(node: TwimlVerb): this {
    this.verbs.push(node);
    return this;
  }

  say(text: string, voice: Voice = "woman", language = "en"): this {
    return this.add({ verb: "Say", text, voice, language });
  }

  message(text: string): this {
    return this.add({ verb: "Message", text });
  }

  play(url: string, loop?: number): this {
    return this.add({ verb: "Play", url, loop });
  }

  redirect(url: string, method?: "GET" | "POST"): this {
    return this.add({ verb: "Redirect", url, method });
  }

  pause(length?: number): this {
    return this.add({ verb: "Pause", length });
  }

  hangup(): this {
    return this.add({ verb: "Hangup" });
  }

  get size(): number {
    return this.verbs.length;
  }

  toXml(): string {
    return `${XML_DECLARATION}<Response>${this.verbs.map(renderVerb).join("")}</Response>`;
  }
}
