import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createWriting, getWriting, listWritings, withDb } from "../src/db/index.js";
import type { Writing } from "../src/writings/types.js";
import { START, createHarness, type Harness } from "./helpers.js";


describe("分类 CRUD", () => {
  let h: Harness;
  let cookie: string | null;

  function list(category: "poemas" | "cuentos" | "escritos"): Writing[] {
    return withDb(h.dbPath, (db) => listWritings(db, category));
  }

  function find(id: number): Writing | null {
    return withDb(h.dbPath, (db) => getWriting(db, id));
  }

  beforeEach(async () => {
    h = await createHarness();
    cookie = await h.login();
  });

  afterEach(async () => {
    await h.cleanup();
  });

  it("无标题新建时使用占位标题，created_at 与 updated_at 相同", async () => {
    const res = await h.post("/categoria/poemas", { title: "   ", content: "  <p>Luna</p>  " }, cookie);
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/categoria/poemas");
    const rows = list("poemas");
    expect(rows).toHaveLength(1);
    expect(rows[0]).toEqual({
      id: 1,
      category: "poemas",
      title: "Sin título",
      content: "<p>Luna</p>",
      created_at: START.toISOString(),
      updated_at: START.toISOString(),
    });
    const page = await h.get("/categoria/poemas", cookie);
    expect(await page.text()).toContain("<strong>Sin título</strong>");
  });

  it("列表按最近更新倒序，只返回本分类", async () => {
    await h.post("/categoria/poemas", { title: "Primero", content: "a" }, cookie);
    h.advance(1_000);
    await h.post("/categoria/poemas", { title: "Segundo", content: "b" }, cookie);
    h.advance(1_000);
    await h.post("/categoria/cuentos", { title: "Cuento", content: "c" }, cookie);
    expect(list("poemas").map((w) => w.title)).toEqual(["Segundo", "Primero"]);

    h.advance(1_000);
    await h.post("/categoria/poemas", { id: "1", title: "Primero editado", content: "a2" }, cookie);
    expect(list("poemas").map((w) => w.title)).toEqual(["Primero editado", "Segundo"]);
    expect(list("cuentos").map((w) => w.title)).toEqual(["Cuento"]);
  });

  it("更新只改标题、正文与 updated_at", async () => {
    await h.post("/categoria/escritos", { title: "Idea", content: "uno" }, cookie);
    h.advance(5_000);
    const res = await h.post("/categoria/escritos", { id: "1", title: "Idea mejor", content: "dos" }, cookie);
    expect(res.status).toBe(302);
    expect(find(1)).toEqual({
      id: 1,
      category: "escritos",
      title: "Idea mejor",
      content: "dos",
      created_at: START.toISOString(),
      updated_at: new Date(START.getTime() + 5_000).toISOString(),
    });
  });

  it("用其他分类的 id 更新不会修改该行", async () => {
    await h.post("/categoria/poemas", { title: "Mío", content: "original" }, cookie);
    const before = find(1);
    h.advance(1_000);
    const res = await h.post("/categoria/cuentos", { id: "1", title: "Hackeado", content: "x" }, cookie);
    expect(res.status).toBe(302);
    expect(find(1)).toEqual(before);
    expect(list("cuentos")).toEqual([]);
  });

  it("非整数 id 返回 400", async () => {
    const res = await h.post("/categoria/poemas", { id: "abc", title: "x", content: "y" }, cookie);
    expect(res.status).toBe(400);
    expect(list("poemas")).toEqual([]);
  });

  it("未知分类返回 404", async () => {
    expect((await h.get("/categoria/novelas", cookie)).status).toBe(404);
    expect((await h.post("/categoria/novelas", { title: "x", content: "y" }, cookie)).status).toBe(404);
  });

  it("edit_id 预填表单，且必须属于当前分类", async () => {
    await h.post("/categoria/poemas", { title: "Mar", content: "<p>Ola</p>" }, cookie);
    const editing = await (await h.get("/categoria/poemas?edit_id=1", cookie)).text();
    expect(editing).toContain(`<input type="hidden" name="id" value="1">`);
    expect(editing).toContain(`<input type="text" name="title" value="Mar" placeholder="Título">`);
    expect(editing).toContain(`<textarea name="content" rows="16">&lt;p&gt;Ola&lt;/p&gt;</textarea>`);
    expect(editing).toContain("<h2>Editar texto</h2>");

    const other = await (await h.get("/categoria/cuentos?edit_id=1", cookie)).text();
    expect(other).toContain(`<input type="hidden" name="id" value="">`);
    expect(other).toContain("<h2>Nuevo texto</h2>");
  });

  it("分类不符的删除不影响数据，正确分类只删除该行", async () => {
    await h.post("/categoria/poemas", { title: "Uno", content: "1" }, cookie);
    await h.post("/categoria/poemas", { title: "Dos", content: "2" }, cookie);

    const mismatched = await h.post("/texto/1/borrar", { slug: "cuentos" }, cookie);
    expect(mismatched.status).toBe(302);
    expect(mismatched.headers.get("location")).toBe("/categoria/cuentos");
    expect(find(1)?.title).toBe("Uno");

    const res = await h.post("/texto/1/borrar", { slug: "poemas" }, cookie);
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/categoria/poemas");
    expect(find(1)).toBeNull();
    expect(list("poemas").map((w) => w.id)).toEqual([2]);
  });

  it("删除时分类缺失或未知返回 400", async () => {
    await h.post("/categoria/poemas", { title: "Uno", content: "1" }, cookie);
    expect((await h.post("/texto/1/borrar", { slug: "otros" }, cookie)).status).toBe(400);
    expect((await h.post("/texto/1/borrar", {}, cookie)).status).toBe(400);
    expect(find(1)?.title).toBe("Uno");
  });

  it("删除不存在的条目不报错", async () => {
    const res = await h.post("/texto/99/borrar", { slug: "poemas" }, cookie);
    expect(res.status).toBe(302);
  });

  it("非数字 id 的路径返回 404", async () => {
    expect((await h.post("/texto/abc/borrar", { slug: "poemas" }, cookie)).status).toBe(404);
  });
});


describe("db 层", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.cleanup();
  });

  it("同一时间戳按 id 倒序", () => {
    withDb(h.dbPath, (db) => {
      const t = new Date("2025-01-01T00:00:00.000Z");
      const a = createWriting(db, { category: "cuentos", title: "A", content: "" }, t);
      const b = createWriting(db, { category: "cuentos", title: "B", content: "" }, t);
      expect(listWritings(db, "cuentos").map((w) => w.id)).toEqual([b, a]);
    });
  });

  it("getWriting 指定分类时按分类限定", () => {
    withDb(h.dbPath, (db) => {
      const id = createWriting(db, { category: "poemas", title: "P", content: "" }, new Date());
      expect(getWriting(db, id, "poemas")?.title).toBe("P");
      expect(getWriting(db, id, "escritos")).toBeNull();
    });
  });
});
