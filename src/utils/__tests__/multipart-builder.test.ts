import {
  buildMultipartBody,
  createBoundary,
} from "../multipart-builder";
import { BoundaryCollisionError } from "../../errors/file-client-error";
import { readMultipart } from "../../__tests__/helpers/multipart-reader";

function sequence(...boundaries: string[]): () => string {
  let i = 0;
  return () => boundaries[Math.min(i++, boundaries.length - 1)];
}

describe("multipart builder", () => {
  describe("createBoundary", () => {
    it("should prefix a v4 UUID with Boundary-", () => {
      expect(createBoundary()).toMatch(
        /^Boundary-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it("should generate a different boundary each time", () => {
      expect(createBoundary()).not.toBe(createBoundary());
    });
  });

  describe("buildMultipartBody", () => {
    it("should lay out fields, then files, with CRLF line endings", () => {
      const result = buildMultipartBody(
        [{ name: "key", value: "a.txt" }],
        [
          {
            name: "file",
            filename: "a.txt",
            contentType: "text/plain",
            data: Buffer.from("hello"),
          },
        ],
        () => "Boundary-test",
      );

      expect(result.body.toString("utf-8")).toBe(
        "--Boundary-test\r\n" +
          'Content-Disposition: form-data; name="key"\r\n' +
          "\r\n" +
          "a.txt\r\n" +
          "--Boundary-test\r\n" +
          'Content-Disposition: form-data; name="file"; filename="a.txt"\r\n' +
          "Content-Type: text/plain\r\n" +
          "\r\n" +
          "hello\r\n" +
          "--Boundary-test--\r\n",
      );
      expect(result.boundary).toBe("Boundary-test");
      expect(result.contentType).toBe(
        "multipart/form-data; boundary=Boundary-test",
      );
    });

    it("should close an empty payload with the terminator only", () => {
      const result = buildMultipartBody([], [], () => "Boundary-empty");

      expect(result.body.toString("utf-8")).toBe("--Boundary-empty--\r\n");
    });

    it("should percent-encode quotes and line breaks in quoted values", () => {
      const result = buildMultipartBody(
        [],
        [
          {
            name: "file",
            filename: 'say "hi"\r\n.txt',
            contentType: "text/plain",
            data: Buffer.from("x"),
          },
        ],
        () => "Boundary-q",
      );

      expect(result.body.toString("utf-8")).toContain(
        'filename="say %22hi%22%0D%0A.txt"\r\n',
      );
    });

    it("should regenerate the boundary when it appears in file content", () => {
      const result = buildMultipartBody(
        [],
        [
          {
            name: "file",
            filename: "f.bin",
            contentType: "",
            data: Buffer.from("prefix --Boundary-one suffix"),
          },
        ],
        sequence("Boundary-one", "Boundary-two"),
      );

      expect(result.boundary).toBe("Boundary-two");
    });

    it("should regenerate the boundary when it appears in a field value", () => {
      const result = buildMultipartBody(
        [{ name: "key", value: "Boundary-one" }],
        [],
        sequence("Boundary-one", "Boundary-two"),
      );

      expect(result.boundary).toBe("Boundary-two");
    });

    it("should give up after repeated collisions", () => {
      const generate = jest.fn().mockReturnValue("Boundary-same");

      let caught: unknown;
      try {
        buildMultipartBody([{ name: "key", value: "Boundary-same" }], [], generate);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(BoundaryCollisionError);
      expect(caught).toMatchObject({
        code: "BOUNDARY_COLLISION",
        details: { attempts: 5 },
      });
      expect(generate).toHaveBeenCalledTimes(5);
    });

    it("should keep binary content intact for a multipart parser", async () => {
      const data = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
      const result = buildMultipartBody(
        [{ name: "key", value: "blob" }],
        [
          {
            name: "file",
            filename: "blob",
            contentType: "application/octet-stream",
            data,
          },
        ],
      );

      const parsed = await readMultipart(result.contentType, result.body);

      expect(parsed.fields).toEqual({ key: "blob" });
      expect(parsed.files).toHaveLength(1);
      expect(parsed.files[0].mimeType).toBe("application/octet-stream");
      expect(parsed.files[0].data.equals(data)).toBe(true);
    });
  });
});
