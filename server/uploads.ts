import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { flash } from "./auth";

export const MAX_FILE_SIZE = 16 * 1024 * 1024;

export const ALLOWED_JOURNAL_EXTENSIONS: ReadonlySet<string> = new Set(["pdf"]);

export const ALLOWED_ASSET_EXTENSIONS: ReadonlySet<string> = new Set([
  "pdf",
  "png",
  "jpg",
  "jpeg",
  "gif",
  "doc",
  "docx",
  "txt",
  "zip",
  "csv",
  "ppt",
  "pptx",
]);

// Files stay in memory until the handler accepts them into a BlobStore
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_FILE_SIZE, files: 1 },
});

/**
 * Parses a multipart form with a single optional file. An oversized payload
 * becomes a notice and a redirect to `rejectTo`, before any handler runs.
 */
export function acceptUpload(field: string, rejectTo: string) {
  const single = upload.single(field);
  return (req: Request, res: Response, next: NextFunction) => {
    single(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        const message =
          err.code === "LIMIT_FILE_SIZE"
            ? "Arquivo excede o limite de 16MB"
            : "Envio de arquivo inválido";
        flash(req, message, "danger");
        return res.redirect(rejectTo);
      }
      if (err) return next(err);
      next();
    });
  };
}
