import { BcryptPasswordHasher } from "../../src/utils/password";

describe("BcryptPasswordHasher", () => {
  const hasher = new BcryptPasswordHasher(4);

  it("verifies the original password only", async () => {
    const hashed = await hasher.hash("password123");

    expect(hashed).not.toBe("password123");
    await expect(hasher.verify("password123", hashed)).resolves.toBe(true);
    await expect(hasher.verify("password124", hashed)).resolves.toBe(false);
  });
});
