// src/routes/rooms.ts
import express from "express";
import { z } from "zod";
import { generateGroupPlan } from "../ai/planners/groupPlanner";
import { suggestInvites } from "../ai/planners/inviteMatcher";
import { GenerationError } from "../ai/providers";
import type { AppContext } from "../context";
import { currentUser } from "./_ensureAuth";
import { HttpError, parseBody, parseIdParam, sendError } from "./_http";

const CreateRoomBody = z.object({ name: z.string().trim().min(1).max(100) });
const InviteBody = z.object({ username: z.string().trim().min(1) });
// stored as typed; trimming only decides emptiness
const MessageBody = z.object({
  content: z
    .string()
    .max(4000)
    .refine((s) => s.trim().length > 0, "empty message"),
});
const PlanBody = z.object({ goal: z.string().trim().optional() });

const MessagesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).catch(50),
});

export function roomsRouter(ctx: AppContext) {
  const rooms = express.Router();

  async function requireMember(roomId: number, userId: number) {
    const room = await ctx.store.getRoom(roomId);
    if (!room) throw new HttpError(404, "room_not_found");
    if (!(await ctx.store.isMember(roomId, userId))) throw new HttpError(403, "not_a_member");
    return room;
  }

  // GET /api/rooms
  rooms.get("/", async (req, res) => {
    try {
      const me = currentUser(req);
      const list = await ctx.store.listRoomsForUser(me.user_id);
      return res.json({ ok: true, rooms: list });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][list]", "rooms_list_failed");
    }
  });

  // POST /api/rooms {name}
  rooms.post("/", async (req, res) => {
    try {
      const me = currentUser(req);
      const { name } = parseBody(CreateRoomBody, req.body);

      if (await ctx.store.findRoomByName(name)) throw new HttpError(409, "room_name_taken");
      const room = await ctx.store.createRoom({ name, owner_id: me.user_id });
      await ctx.store.addMember(room.id, me.user_id);

      console.log("[ROOMS][create]", { room_id: room.id, owner_id: me.user_id });
      return res.json({ ok: true, room });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][create]", "room_create_failed");
    }
  });

  // GET /api/rooms/:roomId/members
  rooms.get("/:roomId/members", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      await requireMember(roomId, me.user_id);
      return res.json({ ok: true, members: await ctx.store.listMembers(roomId) });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][members]", "members_failed");
    }
  });

  // POST /api/rooms/:roomId/invite {username}
  rooms.post("/:roomId/invite", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      const { username } = parseBody(InviteBody, req.body);

      const room = await ctx.store.getRoom(roomId);
      if (!room) throw new HttpError(404, "room_not_found");
      if (room.owner_id !== me.user_id) throw new HttpError(403, "owner_only");

      const invitee = await ctx.store.findUserByUsername(username);
      if (!invitee) throw new HttpError(404, "user_not_found");
      if (await ctx.store.isMember(roomId, invitee.id)) throw new HttpError(409, "already_member");

      await ctx.store.addMember(roomId, invitee.id);
      console.log("[ROOMS][invite]", { room_id: roomId, user_id: invitee.id });
      return res.json({ ok: true });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][invite]", "invite_failed");
    }
  });

  // GET /api/rooms/:roomId/messages?limit=50
  rooms.get("/:roomId/messages", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      await requireMember(roomId, me.user_id);

      const { limit } = MessagesQuery.parse(req.query);
      const recent = await ctx.store.listRecentMessages(roomId, limit);
      const messages = await Promise.all(recent.map(async (m) => (await ctx.broadcaster.toWire(m)).message));
      return res.json({ ok: true, messages });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][messages]", "messages_failed");
    }
  });

  // POST /api/rooms/:roomId/messages {content}
  // Answers as soon as the message is stored and shown; agent work runs in the pool.
  rooms.post("/:roomId/messages", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      const { content } = parseBody(MessageBody, req.body);
      await requireMember(roomId, me.user_id);

      const msg = await ctx.store.insertMessage({ room_id: roomId, user_id: me.user_id, content, is_bot: false });
      await ctx.broadcaster.broadcastMessage(msg);

      const command = ctx.router.dispatch(ctx.pool, { roomId, userId: me.user_id, content });
      if (command !== "none") console.log("[ROOMS][messages][command]", { room_id: roomId, command });

      return res.json({ ok: true, id: msg.id });
    } catch (e: unknown) {
      return sendError(res, e, "[ROOMS][post]", "message_failed");
    }
  });

  // POST /api/rooms/:roomId/ai-plan {goal?}
  rooms.post("/:roomId/ai-plan", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      const { goal } = parseBody(PlanBody, req.body);
      await requireMember(roomId, me.user_id);

      const [history, members, gen] = await Promise.all([
        ctx.router.roomHistory(roomId),
        ctx.store.listMembers(roomId),
        ctx.router.generatorFor(me.user_id),
      ]);
      const plan = await generateGroupPlan(gen.generate, {
        history,
        members: members.map((m) => m.username),
        goal,
      });
      return res.json({ ok: true, backend: gen.backendId, plan });
    } catch (e: unknown) {
      if (e instanceof GenerationError) return res.status(502).json({ ok: false, error: e.code, message: e.message });
      return sendError(res, e, "[ROOMS][ai-plan]", "ai_plan_failed");
    }
  });

  // POST /api/rooms/:roomId/ai-matching {goal?}
  rooms.post("/:roomId/ai-matching", async (req, res) => {
    try {
      const me = currentUser(req);
      const roomId = parseIdParam(req.params.roomId, "invalid_room_id");
      const { goal } = parseBody(PlanBody, req.body);
      await requireMember(roomId, me.user_id);

      const [history, members, gen] = await Promise.all([
        ctx.router.roomHistory(roomId),
        ctx.store.listMembers(roomId),
        ctx.router.generatorFor(me.user_id),
      ]);
      const suggestions = await suggestInvites(gen.generate, {
        history,
        members: members.map((m) => m.username),
        goal,
      });
      return res.json({ ok: true, backend: gen.backendId, suggestions });
    } catch (e: unknown) {
      if (e instanceof GenerationError) return res.status(502).json({ ok: false, error: e.code, message: e.message });
      return sendError(res, e, "[ROOMS][ai-matching]", "ai_matching_failed");
    }
  });

  return rooms;
}
