import * as Pulumi from "@pulumi/pulumi";
import { describe, expect, it } from "vitest";
import type { PostgresConfig } from "../../src/database/postgres/postgres-config.js";
import { PostgresProvisioner } from "../../src/database/postgres/postgres-provisioner.js";
import { RecordingMocks } from "../helpers/recording-mocks.js";
import { promiseOf, useStackTestContext } from "../helpers/stack-test-context.js";


describe("PostgresProvisioner", () =>
{
    const { mocks, logger } = useStackTestContext();

    const createConfig = (overrides: Partial<PostgresConfig> = {}): PostgresConfig => ({
        subnetIds: [Pulumi.output("subnet-a"), Pulumi.output("subnet-b")],
        securityGroupIds: [Pulumi.output("sg-db")],
        databaseName: "orders",
        instanceClass: "db.t3.micro",
        username: "orders_admin",
        password: "test-password",
        ...overrides
    });

    it("should create a subnet group and a private multi-az instance", async () =>
    {
        const details = new PostgresProvisioner("orders-db", createConfig()).provision();

        expect(logger.lines).toEqual([
            "INFO Created DB subnet group: orders-db-subnet-grp",
            "INFO Created RDS instance: orders-db"
        ]);

        expect(await promiseOf(details.endpoint)).toBe("orders-db.test.rds.local:5432");
        expect(await promiseOf(details.address)).toBe("orders-db.test.rds.local");
        expect(await promiseOf(details.port)).toBe(5432);
        expect(await promiseOf(details.databaseName)).toBe("orders");
        expect(await promiseOf(details.username)).toBe("orders_admin");
        expect(await promiseOf(details.password)).toBe("test-password");
        expect(await Pulumi.isSecret(details.password)).toBe(true);

        const subnetGroup = await mocks.waitFor("aws:rds/subnetGroup:SubnetGroup", "orders-db-subnet-grp");
        expect(subnetGroup.inputs.subnetIds).toEqual(["subnet-a", "subnet-b"]);

        const instance = await mocks.waitFor("aws:rds/instance:Instance", "orders-db");
        expect(instance.inputs).toMatchObject({
            instanceClass: "db.t3.micro",
            allocatedStorage: 20,
            engine: "postgres",
            engineVersion: "13.7",
            dbName: "orders",
            username: "orders_admin",
            port: 5432,
            vpcSecurityGroupIds: ["sg-db"],
            dbSubnetGroupName: "orders-db-subnet-grp",
            multiAz: true,
            publiclyAccessible: false,
            storageEncrypted: true,
            backupRetentionPeriod: 1,
            skipFinalSnapshot: true
        });
        expect(instance.inputs.finalSnapshotIdentifier).toBeUndefined();

        await mocks.settle();
        expect(mocks.ofType("random:index/randomPassword:RandomPassword")).toHaveLength(0);
    });

    it("should generate a password when none is given", async () =>
    {
        const details = new PostgresProvisioner("gen-db", createConfig({ password: undefined })).provision();

        expect(await promiseOf(details.password)).toBe(RecordingMocks.generatedPassword);

        const generator = await mocks.waitFor("random:index/randomPassword:RandomPassword", "gen-db-rpass");
        expect(generator.inputs).toMatchObject({
            length: 16,
            special: true,
            overrideSpecial: "_"
        });
    });

    describe("validation", () =>
    {
        it("should reject a single subnet", () =>
        {
            expect(() => new PostgresProvisioner("orders-db", createConfig({ subnetIds: [Pulumi.output("subnet-a")] }))).toThrow();
        });

        it("should reject a database name that starts with a digit", () =>
        {
            expect(() => new PostgresProvisioner("orders-db", createConfig({ databaseName: "1orders" }))).toThrow();
        });

        it("should reject an instance class outside the db family", () =>
        {
            expect(() => new PostgresProvisioner("orders-db", createConfig({ instanceClass: "t3.micro" }))).toThrow();
        });

        it("should reject a config without security groups", () =>
        {
            expect(() => new PostgresProvisioner("orders-db", createConfig({ securityGroupIds: [] }))).toThrow();
        });
    });
});
