import { Router } from "express";
import { TaskStore } from "../../stores/taskStore";
import { CategoryStore } from "../../stores/categoryStore";
import { sendError } from "../errors";

const router = Router();
const taskStore = new TaskStore();
const categoryStore = new CategoryStore();

// GET /api/catalog/categories - Categories with quota and number of tasks
router.get("/categories", (req, res) => {
  try {
    const tasksByCategory = taskStore.listTasksByCategory();
    const categories = categoryStore.listCategories().map((category) => ({
      ...category,
      taskCount: tasksByCategory.get(category.id)?.length ?? 0,
    }));
    res.json(categories);
  } catch (error) {
    sendError(res, error, "Failed to fetch categories");
  }
});

export default router;
