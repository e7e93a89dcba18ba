import multer from "multer";
import { env } from "../config/env";

/** Answer CSV uploads, kept in memory; field name `file`. */
export const answersUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: env.MAX_UPLOAD_BYTES, files: 1 }
}).single("file");
