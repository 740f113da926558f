import express from "express";
import multer from "multer";
import path from "path";
import fs from "fs-extra";
import { ShiftImportConfig } from "./config/env";
import { PipelineError, SubmissionError } from "./errors/pipelineErrors";
import { PipelineOptions, ShiftPipeline } from "./pipeline/shiftPipeline";

export function createApp(
  config: ShiftImportConfig,
  options: PipelineOptions = {}
): express.Express {
  const app = express();

  const uploadDir = path.resolve(config.uploadDir);
  fs.ensureDirSync(uploadDir);

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, uploadDir);
    },
    filename: (_req, file, cb) => {
      cb(null, `${Date.now()}-${path.basename(file.originalname)}`);
    },
  });

  const upload = multer({ storage });

  app.post("/upload", upload.single("shifts"), async (req, res) => {
    if (!req.file || !req.file.path) {
      res.status(400).json({ error: "No file uploaded" });
      return;
    }
    const filePath = req.file.path;

    try {
      const pipeline = await ShiftPipeline.build(
        { ...config, inputFile: filePath, writeOutputFile: false },
        options
      );
      const preview = {
        valid: pipeline.isValid,
        needs: pipeline.payload.order.length,
        shifts: pipeline.shiftCount,
        payload: pipeline.payload.order.map((needId) => ({
          needId,
          ...pipeline.payload.needs[needId],
        })),
      };

      if (req.query.submit !== "true") {
        res.status(200).json(preview);
        return;
      }

      const summary = await pipeline.submit();
      res.status(200).json({ ...preview, summary });
    } catch (err) {
      if (err instanceof SubmissionError) {
        res.status(502).json({
          error: err.message,
          needId: err.needId,
          submitted: err.submitted,
        });
      } else if (err instanceof PipelineError) {
        res.status(422).json({ error: err.message });
      } else {
        res.status(500).json({ error: (err as Error).message });
      }
    } finally {
      await fs.remove(filePath).catch((err: Error) => {
        console.error(`Failed to remove upload ${filePath}:`, err.message);
      });
    }
  });

  return app;
}
