// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Schema } from "effect";
import { describe, expect, test } from "vitest";
import {
  MAX_EPOCH_SECONDS,
  RegularStackSchema,
  formatCreatedAt,
  fromEdgeStack,
  fromRegularStack,
} from "../../src/stack/types";
import { edgeStack, regularStack } from "../helpers/stack-fakes";

describe("formatCreatedAt", () => {
  test("formats epoch seconds as UTC RFC3339 without fractions", () => {
    expect(formatCreatedAt(0)).toBe("1970-01-01T00:00:00Z");
    expect(formatCreatedAt(1700000000)).toBe("2023-11-14T22:13:20Z");
  });

  test("formats the latest representable second", () => {
    expect(formatCreatedAt(MAX_EPOCH_SECONDS)).toBe("+275760-09-13T00:00:00Z");
  });
});

describe("RegularStackSchema", () => {
  const decode = Schema.decodeUnknownEither(RegularStackSchema);

  test("defaults a missing creation date to zero", () => {
    expect(Either.getOrUndefined(decode({ Id: 1, Name: "web" }))).toEqual({
      Id: 1,
      Name: "web",
      Type: 0,
      EndpointId: 0,
      CreationDate: 0,
      Status: 0,
    });
  });

  test.each([1e13, -1, 1.5])("rejects creation date %s", (creationDate) => {
    expect(Either.isLeft(decode({ Id: 1, Name: "web", CreationDate: creationDate }))).toBe(true);
  });
});

describe("conversion to Stack", () => {
  test("regular stacks carry no groups", () => {
    expect(fromRegularStack(regularStack(2, "db", 86400))).toEqual({
      id: 2,
      name: "db",
      createdAt: "1970-01-02T00:00:00Z",
      environmentGroupIds: [],
    });
  });

  test("edge stacks carry their edge groups", () => {
    expect(fromEdgeStack(edgeStack(9, "sensor", 0, [5, 1])).environmentGroupIds).toEqual([5, 1]);
  });

  test("absent edge groups become an empty list", () => {
    const stack = fromEdgeStack(edgeStack(9, "sensor", 0));

    expect(stack.environmentGroupIds).toEqual([]);
    expect(JSON.stringify(stack)).toBe(
      '{"id":9,"name":"sensor","createdAt":"1970-01-01T00:00:00Z","environmentGroupIds":[]}'
    );
  });
});
