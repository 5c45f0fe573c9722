import { Router } from "express";
import { GroupStore } from "../../stores/groupStore";
import { sendError } from "../errors";

const router = Router();
const groupStore = new GroupStore();

// GET /api/groups - Roster, read-only
router.get("/", (req, res) => {
  try {
    res.json(groupStore.getAll());
  } catch (error) {
    sendError(res, error, "Failed to fetch groups");
  }
});

// GET /api/groups/:id
router.get("/:id", (req, res) => {
  try {
    const group = groupStore.load(req.params.id);
    if (!group) {
      return res.status(404).json({ error: "Group not found" });
    }
    res.json(group);
  } catch (error) {
    sendError(res, error, "Failed to fetch group");
  }
});

export default router;
