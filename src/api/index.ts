import express from "express";
import cors from "cors";

import { config } from "../config";
import examsRouter from "./routes/exams";
import groupsRouter from "./routes/groups";
import catalogRouter from "./routes/catalog";

const app = express();
const PORT = config.apiPort;

// Middleware
app.use(cors({
  origin: config.corsOrigins,
  credentials: true,
}));
app.use(express.json());

// Routes
app.use("/api/exams", examsRouter);
app.use("/api/groups", groupsRouter);
app.use("/api/catalog", catalogRouter);

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Start server
app.listen(PORT, () => {
  console.log(`[API] Exam server running on http://localhost:${PORT}`);
});

export default app;
