import { describe, expect, it } from "vitest";

import { MalformedResponse } from "./errors.js";
import { Domain, Model } from "./models.js";
import { Response, readReplyCode } from "./response.js";
import { parseResponse } from "./xml.js";

const searchReply = `<openXML><reply><code>0</code><desc></desc><data>
  <results><array>
    <item><domain><name>example</name><extension>com</extension></domain><status>ACT</status></item>
    <item><domain><name>example</name><extension>net</extension></domain><status>REQ</status></item>
  </array></results>
  <total>2</total>
</data></reply></openXML>`;

describe("Response", () => {
  it("exposes the reply fields", async () => {
    const response = new Response(await parseResponse(searchReply));

    expect(response.code).toBe(0);
    expect(response.description).toBe("");
    expect(response.total).toBe(2);
    expect(response.data?.name).toBe("data");
  });

  it("wraps listing items as models", async () => {
    const response = new Response(await parseResponse(searchReply));
    const items = response.asModels(Model);

    expect(items).toHaveLength(2);
    expect(items.map((item) => item.get("status"))).toEqual(["ACT", "REQ"]);
    expect(items[1]?.submodel(Domain, "domain").toString()).toBe("example.net");
  });

  it("wraps a named child of data", async () => {
    const response = new Response(
      await parseResponse(
        "<openXML><reply><code>0</code><data><domain><name>example</name></domain></data></reply></openXML>"
      )
    );

    expect(response.asModel(Domain, "domain").get("name")).toBe("example");
    expect(response.toModel().has("domain")).toBe(true);
    expect(response.total).toBeNull();
    expect(response.asModels(Model)).toEqual([]);
  });
});

describe("readReplyCode", () => {
  it("reads the code of a bare reply document", async () => {
    expect(readReplyCode(await parseResponse("<reply><code>346</code></reply>"))).toBe(346);
  });

  it("rejects replies without a numeric code", async () => {
    const missing = await parseResponse("<openXML><reply><desc>x</desc></reply></openXML>");
    const text = await parseResponse("<openXML><reply><code>abc</code></reply></openXML>");

    expect(() => readReplyCode(missing)).toThrow(MalformedResponse);
    expect(() => readReplyCode(text)).toThrow("The response has no numeric reply code.");
  });

  it("accepts only plain decimal codes", async () => {
    for (const code of ["0x0", "1e2", "0b0", "1.0", "+0"]) {
      const tree = await parseResponse(`<reply><code>${code}</code></reply>`);

      expect(() => readReplyCode(tree)).toThrow(MalformedResponse);
    }

    expect(readReplyCode(await parseResponse("<reply><code>-1</code></reply>"))).toBe(-1);
  });
});
