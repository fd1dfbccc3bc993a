import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  downloadNameFor,
  hasPdfSignature,
  isPdfUpload,
  readFileHead,
  secureFilename,
} from "../compression/pdfInput.js";

describe("pdf input checks", () => {
  const pdf = Buffer.from("%PDF-1.7\n...");

  it("requires name, media type and signature to agree", () => {
    expect(isPdfUpload({ originalname: "a.PDF", mimetype: "application/pdf", buffer: pdf })).toBe(true);
    expect(isPdfUpload({ originalname: "a.txt", mimetype: "application/pdf", buffer: pdf })).toBe(false);
    expect(isPdfUpload({ originalname: "a.pdf", mimetype: "text/plain", buffer: pdf })).toBe(false);
    expect(
      isPdfUpload({ originalname: "a.pdf", mimetype: "application/pdf", buffer: Buffer.from("hello") })
    ).toBe(false);
  });

  it("detects the signature on short buffers", () => {
    expect(hasPdfSignature(Buffer.from("%PD"))).toBe(false);
    expect(hasPdfSignature(Buffer.from("%PDF-"))).toBe(true);
  });

  it("reads the head of a file, or null when it is missing", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "pdfinput-"));
    try {
      const file = path.join(dir, "x.pdf");
      await fs.writeFile(file, pdf);
      expect((await readFileHead(file))?.toString()).toBe("%PDF-");
      expect(await readFileHead(path.join(dir, "missing.pdf"))).toBeNull();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("secureFilename", () => {
  it.each([
    ["My Report.pdf", "My_Report.pdf"],
    ["../../etc/passwd", "etc_passwd"],
    ["résumé final.pdf", "resume_final.pdf"],
    ["..hidden.", "hidden"],
    ["a;b<c>.pdf", "abc.pdf"],
  ])("%s -> %s", (input, expected) => {
    expect(secureFilename(input)).toBe(expected);
  });
});

describe("downloadNameFor", () => {
  it("appends the compressed suffix", () => {
    expect(downloadNameFor("Annual Report.pdf")).toBe("Annual_Report-compressed.pdf");
  });

  it("falls back when nothing safe remains", () => {
    expect(downloadNameFor("文書.pdf")).toBe("pdf-compressed.pdf");
    expect(downloadNameFor("///")).toBe("document-compressed.pdf");
  });
});
