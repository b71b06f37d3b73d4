import multer from "multer";
import { Request } from "express";
import { IMAGE_CONSTRAINTS } from "../services/ImageService";
import { ValidationError } from "../utils/errors";

/**
 * Multer configuration for image uploads
 *
 * Uses memory storage; the image store decides where the bytes end up
 */

const storage = multer.memoryStorage();

// File filter to accept only images
const fileFilter = (
  _req: Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
): void => {
  if (file.mimetype.startsWith("image/")) {
    cb(null, true);
  } else {
    cb(new ValidationError("Only image files are allowed"));
  }
};

/**
 * Single image upload middleware (field "image")
 */
export const uploadSingle = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: IMAGE_CONSTRAINTS.MAX_FILE_SIZE,
    files: 1,
  },
}).single("image");
